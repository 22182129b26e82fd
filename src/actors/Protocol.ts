// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import type { Definition } from './Definition.js'
import type { Message } from './Message.js'

/**
 * Factory for actor instances.
 *
 * The stage prepares the actor's environment, then calls instantiate(),
 * which must construct exactly one new actor.
 */
export interface ProtocolInstantiator<M extends Message, S> {
  /**
   * Creates an actor instance.
   * @param definition Type and address of the actor being created
   * @returns New actor instance
   */
  instantiate(definition: Definition): Actor<M, S>
}

/**
 * Defines the type name and instantiation of an actor.
 *
 * Passed to stage.actorFor() to create an actor:
 *
 * ```typescript
 * const ChartProtocol: Protocol<ChartMessage, ChartState> = {
 *   type: () => 'MetricsChart',
 *   instantiator: () => ({
 *     instantiate: () => new MetricsChartActor(60)
 *   })
 * }
 *
 * const chart = stage().actorFor(ChartProtocol)
 * ```
 */
export interface Protocol<M extends Message, S> {
  instantiator(): ProtocolInstantiator<M, S>

  /**
   * Returns the type identifier, typically the actor class name.
   */
  type(): string
}

/**
 * Shorthand for a Protocol built from a type name and a factory.
 *
 * @param type Actor type identifier
 * @param create Creates a new actor instance
 * @returns The protocol
 */
export function protocolOf<M extends Message, S>(type: string, create: (definition: Definition) => Actor<M, S>): Protocol<M, S> {
  return {
    instantiator: () => ({ instantiate: create }),
    type: () => type
  }
}
