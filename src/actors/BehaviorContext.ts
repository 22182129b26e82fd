// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import type { ActorRef, MessageOf } from './ActorRef.js'
import type { BehaviorStack } from './BehaviorStack.js'
import type { HandlerSet } from './HandlerSet.js'
import type { Logger } from './Logger.js'
import type { Message } from './Message.js'
import type { Stage } from './Stage.js'

/**
 * What an action can see and do while it handles one message.
 *
 * `state` is the actor's private state record, shared by every behavior of
 * the actor. Switching behaviors never touches it.
 *
 * become() and unbecome() are requests: they are recorded in call order and
 * applied to the behavior stack after the action (and any promise it
 * returned) completes successfully, before the next message is dispatched.
 * If the action fails, the requests are dropped.
 */
export interface BehaviorContext<M extends Message, S> {
  /**
   * The actor's mutable state record.
   */
  readonly state: S

  /**
   * Returns a reference to this actor, e.g. as a reply address.
   */
  self(): ActorRef<M>

  logger(): Logger

  stage(): Stage

  /**
   * Returns the behavior the current message was dispatched to.
   * Requests made during this delivery are not yet reflected.
   */
  currentBehavior(): HandlerSet<M, S>

  /**
   * Requests a switch to `handlerSet`.
   * @param handlerSet The behavior to adopt
   * @param discardPrevious Replace the current behavior (default) or push over it
   */
  become(handlerSet: HandlerSet<M, S>, discardPrevious?: boolean): void

  /**
   * Requests a revert to the previous behavior. Safe at depth 1, where it
   * does nothing.
   */
  unbecome(): void

  /**
   * Sends a message to another actor (or to self). Fire-and-forget.
   * @param to Recipient
   * @param message The message
   */
  send<R extends ActorRef<Message>>(to: R, message: MessageOf<R>): void
}

/**
 * Thrown when a context is used after its delivery completed, for example
 * from a timer callback set up inside an action.
 */
export class StaleBehaviorContextError extends Error {
  constructor(actorType: string) {
    super(`Behavior context of ${actorType} used after its message delivery completed`)
    this.name = 'StaleBehaviorContextError'
  }
}

type BehaviorChange<M extends Message, S> =
  | { readonly kind: 'become', readonly handlerSet: HandlerSet<M, S>, readonly discardPrevious: boolean }
  | { readonly kind: 'unbecome' }

/**
 * BehaviorContext of a single delivery (a message or the start hook).
 *
 * INTERNAL: created and committed by Actor.
 */
export class DeliveryContext<M extends Message, S> implements BehaviorContext<M, S> {
  private readonly _actor: Actor<M, S>
  private readonly _behavior: HandlerSet<M, S>
  private readonly _changes: BehaviorChange<M, S>[] = []
  private _active = true

  /**
   * @param actor The receiving actor
   * @param behavior The behavior in effect for this delivery
   */
  constructor(actor: Actor<M, S>, behavior: HandlerSet<M, S>) {
    this._actor = actor
    this._behavior = behavior
  }

  get state(): S {
    this.ensureActive()
    return this._actor.state()
  }

  self(): ActorRef<M> {
    return this._actor.self()
  }

  logger(): Logger {
    return this._actor.logger()
  }

  stage(): Stage {
    return this._actor.stage()
  }

  currentBehavior(): HandlerSet<M, S> {
    return this._behavior
  }

  become(handlerSet: HandlerSet<M, S>, discardPrevious: boolean = true): void {
    this.ensureActive()
    this._changes.push({ kind: 'become', handlerSet, discardPrevious })
  }

  unbecome(): void {
    this.ensureActive()
    this._changes.push({ kind: 'unbecome' })
  }

  send<R extends ActorRef<Message>>(to: R, message: MessageOf<R>): void {
    to.tell(message)
  }

  /**
   * Applies the requested changes to `stack` in call order and deactivates
   * this context.
   * @param stack The actor's behavior stack
   */
  commitTo(stack: BehaviorStack<M, S>): void {
    for (const change of this._changes) {
      if (change.kind === 'become') {
        stack.become(change.handlerSet, change.discardPrevious)
      } else {
        stack.unbecome()
      }
    }
    this.close()
  }

  /**
   * Drops any requested changes and deactivates this context.
   */
  close(): void {
    this._changes.length = 0
    this._active = false
  }

  private ensureActive(): void {
    if (!this._active) {
      throw new StaleBehaviorContextError(this._actor.type())
    }
  }
}
