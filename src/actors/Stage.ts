// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef, MessageOf } from './ActorRef.js'
import type { Address } from './Address.js'
import type { DeadLetters } from './DeadLetters.js'
import type { Environment } from './Environment.js'
import { LocalStage } from './LocalStage.js'
import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import type { Message } from './Message.js'
import type { Protocol } from './Protocol.js'
import type { UnhandledPolicy } from './StageConfig.js'
import type { Supervisor } from './Supervisor.js'

/**
 * Per-actor choices made at creation.
 */
export interface ActorOptions {
  /** Mailbox to use instead of a new ArrayMailbox */
  mailbox?: Mailbox
  /** Name of a registered supervisor (default: 'default') */
  supervisorName?: string
  /** Overrides the stage's unhandled-message policy */
  unhandledPolicy?: UnhandledPolicy
}

/**
 * The runtime that creates, supervises and stops actors.
 */
export interface Stage {
  /**
   * Creates and starts an actor.
   *
   * The actor's initial behavior is installed before this returns, and its
   * start hook is the first entry in its mailbox.
   *
   * @param protocol Type name and factory of the actor
   * @param options Per-actor mailbox, supervisor and unhandled policy
   * @returns Reference to the new actor
   */
  actorFor<M extends Message, S>(protocol: Protocol<M, S>, options?: ActorOptions): ActorRef<M>

  /**
   * Looks up a live actor.
   */
  actorOf(address: Address): Promise<ActorRef<Message> | undefined>

  /**
   * Same as to.tell(message).
   */
  send<R extends ActorRef<Message>>(to: R, message: MessageOf<R>): void

  /**
   * Returns a new unique address from the stage's address factory.
   */
  address(): Address

  deadLetters(): DeadLetters

  /**
   * Formats an actor id for log lines.
   */
  idFrom(environment: Environment): string

  logger(): Logger

  /**
   * Returns a new default mailbox.
   */
  mailbox(): Mailbox

  /**
   * @param name Registered supervisor name (default: 'default')
   * @throws SupervisorNotFoundError if none is registered under `name`
   */
  supervisor(name?: string): Supervisor

  registerSupervisor(name: string, supervisor: Supervisor): void

  /**
   * Registers a runtime value (a client, a configuration) that actors
   * retrieve by name through stage().registeredValue().
   */
  registerValue<V>(name: string, value: V): void

  /**
   * @throws Error if no value is registered under `name`
   */
  registeredValue<V>(name: string): V

  deregisterValue<V>(name: string): V | undefined

  /**
   * Stops every actor on the stage.
   */
  close(): Promise<void>
}

let _stage: LocalStage | undefined = undefined

/**
 * The process-wide default stage, created on first use.
 */
export const stage = (): Stage => {
  if (_stage === undefined) {
    _stage = new LocalStage()
  }
  return _stage
}
