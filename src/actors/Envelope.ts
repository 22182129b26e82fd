// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Unit of work queued in a mailbox.
 *
 * An envelope carries either an application message or a runtime request
 * (start hook, external restart, inspection) to one actor. Routing all of
 * them through the mailbox keeps every one of them serialized with the
 * actor's message processing.
 */
export interface Envelope {
  /**
   * Performs the work against the target actor.
   * Failures are handled inside; the returned promise never rejects.
   */
  deliver(): Promise<void>

  /**
   * Returns whether this envelope carries work.
   * EmptyEnvelope returns false.
   */
  isDeliverable(): boolean

  /**
   * Called instead of deliver() when the mailbox is closed: routes a
   * message to dead letters or rejects a pending request.
   */
  undeliverable(): void

  /**
   * Returns a human-readable representation, e.g. "Metric{"value":3}".
   */
  representation(): string

  toString(): string
}

/**
 * Sentinel returned by Mailbox.receive() when the queue is empty.
 */
export const EmptyEnvelope: Envelope = {
  deliver(): Promise<void> {
    return Promise.resolve()
  },

  isDeliverable(): boolean {
    return false
  },

  undeliverable(): void {},

  representation(): string {
    return 'not-a-message'
  },

  toString(): string {
    return 'EmptyEnvelope'
  }
}
