// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import type { Address } from './Address.js'
import { createDeferred } from './DeferredPromise.js'
import type { Envelope } from './Envelope.js'
import type { ActorStatus } from './LifeCycle.js'
import { LocalEnvelope } from './LocalEnvelope.js'
import { type Message, representationOf } from './Message.js'

/**
 * Diagnostic view of an actor, taken between two message deliveries.
 */
export interface BehaviorSnapshot {
  readonly type: string
  readonly address: string
  readonly status: ActorStatus
  /** Behavior names, bottom to top */
  readonly behaviors: readonly string[]
  /** Name of the active behavior */
  readonly current: string
  readonly depth: number
  /** The actor's observable state */
  readonly state: Record<string, unknown>
}

/**
 * The only handle clients hold on an actor.
 *
 * Every operation that touches the actor goes through its mailbox, so the
 * actor never processes two things at once.
 */
export interface ActorRef<M extends Message> {
  address(): Address

  type(): string

  /**
   * Enqueues `message` for delivery. Fire-and-forget: a message the active
   * behavior does not handle, or one sent to a stopped actor, is reported
   * to dead letters rather than to the sender.
   *
   * Messages from one sender are delivered in the order they were told.
   */
  tell(message: M): void

  /**
   * Resolves with a snapshot of the behavior stack and observable state,
   * taken after every message told before this call was processed.
   * Rejects with ActorStoppedError if the actor is stopped.
   */
  inspect(): Promise<BehaviorSnapshot>

  /**
   * Restarts the actor after every message told before this call was
   * processed: fresh state, the initial behavior only, then the start hook.
   * Rejects with ActorStoppedError if the actor is stopped.
   *
   * @param reason Passed to the restart hooks
   */
  restart(reason?: Error): Promise<void>

  /**
   * Stops the actor. Messages still queued become dead letters.
   */
  stop(): Promise<void>

  isStopped(): boolean

  equals(other: ActorRef<Message>): boolean

  toString(): string
}

/**
 * The message protocol of an actor reference.
 */
export type MessageOf<R> = R extends ActorRef<infer T extends Message> ? T : never

/**
 * Thrown (as a rejection) by inspect() and restart() of a stopped actor.
 */
export class ActorStoppedError extends Error {
  constructor(type: string, address: Address, representation: string) {
    super(`${representation} not delivered: ${type} at ${address.valueAsString()} is stopped`)
    this.name = 'ActorStoppedError'
  }
}

/**
 * ActorRef of an actor on a local stage.
 *
 * INTERNAL: created by Actor; clients receive it from stage.actorFor().
 */
export class LocalActorRef<M extends Message, S> implements ActorRef<M> {
  private readonly _actor: Actor<M, S>

  constructor(actor: Actor<M, S>) {
    this._actor = actor
  }

  address(): Address {
    return this._actor.address()
  }

  type(): string {
    return this._actor.type()
  }

  tell(message: M): void {
    this.mailboxSend(new LocalEnvelope<M, S>(
      this._actor,
      actor => actor.receive(message),
      representationOf(message)
    ))
  }

  inspect(): Promise<BehaviorSnapshot> {
    const deferred = createDeferred<BehaviorSnapshot>()
    this.mailboxSend(new LocalEnvelope<M, S, BehaviorSnapshot>(
      this._actor,
      actor => actor.snapshot(),
      'inspect()',
      deferred
    ))
    return deferred.promise
  }

  restart(reason: Error = new Error('Restart requested')): Promise<void> {
    const deferred = createDeferred<void>()
    this.mailboxSend(new LocalEnvelope<M, S>(
      this._actor,
      actor => actor.restartWith(reason),
      'restart()',
      deferred
    ))
    return deferred.promise
  }

  stop(): Promise<void> {
    return this._actor.stop()
  }

  isStopped(): boolean {
    return this._actor.isStopped()
  }

  equals(other: ActorRef<Message>): boolean {
    return this.address().equals(other.address())
  }

  toString(): string {
    return `ActorRef[type: ${this.type()} address: ${this.address().valueAsString()}]`
  }

  /**
   * References inside message payloads are represented by toString().
   */
  toJSON(): string {
    return this.toString()
  }

  private mailboxSend(envelope: Envelope): void {
    this._actor.environment().mailbox().send(envelope)
  }
}
