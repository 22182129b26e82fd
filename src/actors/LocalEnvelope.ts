// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import { ActorStoppedError } from './ActorRef.js'
import { DeadLetter } from './DeadLetters.js'
import type { DeferredPromise } from './DeferredPromise.js'
import type { Envelope } from './Envelope.js'
import type { Message } from './Message.js'
import { StageSupervisedActor } from './Supervisor.js'

/**
 * Operation run against the actor when an envelope is delivered.
 */
export type EnvelopeFunction<M extends Message, S, R> = (actor: Actor<M, S>) => R | Promise<R>

/**
 * Envelope for an actor on a local stage.
 *
 * Carries one operation (a message delivery, the start hook, a restart or an
 * inspection) and, for operations with a result, the deferred promise the
 * caller is waiting on.
 *
 * Delivery:
 * - actor stopped: undeliverable()
 * - success: the deferred resolves with the result
 * - failure: logged, the deferred rejects, the mailbox is suspended and the
 *   fault is reported to the stage for supervision
 */
export class LocalEnvelope<M extends Message, S, R = void> implements Envelope {
  private readonly _actor: Actor<M, S>
  private readonly _function: EnvelopeFunction<M, S, R>
  private readonly _representation: string
  private readonly _deferred: DeferredPromise<R> | undefined

  /**
   * @param actor Target actor
   * @param fn Operation to run on the actor
   * @param representation Short description for logs and dead letters
   * @param deferred Receives the result, if the caller waits for one
   */
  constructor(
    actor: Actor<M, S>,
    fn: EnvelopeFunction<M, S, R>,
    representation: string,
    deferred?: DeferredPromise<R>
  ) {
    this._actor = actor
    this._function = fn
    this._representation = representation
    this._deferred = deferred
  }

  isDeliverable(): boolean {
    return true
  }

  async deliver(): Promise<void> {
    const actor = this._actor

    if (actor.isStopped()) {
      this.undeliverable()
      return
    }

    try {
      const result = await this._function(actor)
      this._deferred?.resolve(result)
    } catch (error: unknown) {
      const errorObj = error instanceof Error ? error : new Error(String(error))

      actor.logger().error(`Message processing failed: ${errorObj.message}`, errorObj)

      this._deferred?.reject(errorObj)

      const environment = actor.environment()
      environment.mailbox().suspend()
      environment.stage().handleFailureOf(new StageSupervisedActor(actor, errorObj), environment.supervisorName())
    }
  }

  /**
   * A caller waiting on a result is told the actor is stopped; anything else
   * becomes a dead letter.
   */
  undeliverable(): void {
    const actor = this._actor

    if (this._deferred !== undefined) {
      this._deferred.reject(new ActorStoppedError(actor.type(), actor.address(), this._representation))
      return
    }

    actor.deadLetters().failedDelivery(new DeadLetter(actor.self(), this._representation, 'stopped'))
  }

  representation(): string {
    return this._representation
  }

  toString(): string {
    return 'LocalEnvelope[to: ' + this._actor.type() + ' subject: ' + this._representation + ']'
  }
}
