// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Named values an actor chooses to expose through ActorRef.inspect().
 *
 * Actors build one in observableState(). Values should be copies, since the
 * snapshot leaves the actor's message processing.
 */
export class ObservableState {
  private readonly values: Map<string, unknown>

  constructor() {
    this.values = new Map()
  }

  /**
   * Adds or replaces a value. Chainable.
   */
  putValue(name: string, value: unknown): ObservableState {
    this.values.set(name, value)
    return this
  }

  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.values)
  }
}
