// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import type { ActorRef } from './ActorRef.js'
import type { Address } from './Address.js'
import type { Logger } from './Logger.js'
import type { Message } from './Message.js'

/**
 * How a supervisor handles a faulted actor.
 *
 * - Restart: fresh state, behavior stack reset to the initial behavior
 * - Resume: keep state and behaviors, continue with the next message
 * - Stop: terminate the actor
 */
export enum SupervisionDirective {
  Restart,
  Resume,
  Stop
}

/**
 * Limits on restarts: at most intensity() restarts within period() milliseconds.
 */
export abstract class SupervisionStrategy {
  /** 1 restart per period */
  static DefaultIntensity = 1
  /** No limit */
  static ForeverIntensity = -1

  /** 5 seconds */
  static DefaultPeriod = 5000
  static ForeverPeriod = Number.MAX_SAFE_INTEGER

  /**
   * Maximum restarts within the period (-1 = unlimited).
   */
  abstract intensity(): number

  /**
   * Time window in milliseconds for counting restarts.
   */
  abstract period(): number
}

/**
 * One restart per 5 seconds.
 */
export class DefaultSupervisionStrategy extends SupervisionStrategy {
  intensity(): number {
    return SupervisionStrategy.DefaultIntensity
  }

  period(): number {
    return SupervisionStrategy.DefaultPeriod
  }
}

/**
 * Unlimited restarts.
 */
export class ForeverSupervisionStrategy extends SupervisionStrategy {
  intensity(): number {
    return SupervisionStrategy.ForeverIntensity
  }

  period(): number {
    return SupervisionStrategy.ForeverPeriod
  }
}

/**
 * A faulted actor as seen by its supervisor.
 *
 * Its mailbox is suspended until one of restart(), resume() or stop() is
 * applied.
 */
export interface Supervised {
  actor(): ActorRef<Message>

  address(): Address

  /**
   * The fault being supervised.
   */
  error(): Error

  logger(): Logger

  /**
   * Restarts the actor and resumes its mailbox. If the restart itself fails,
   * the actor is stopped.
   */
  restart(): Promise<void>

  /**
   * Calls beforeResume(), marks the actor Running and resumes the mailbox.
   */
  resume(): void

  stop(): Promise<void>
}

/**
 * Decides what happens to actors whose actions fault.
 *
 * Registered on the stage by name; actors choose one through
 * ActorOptions.supervisorName.
 */
export interface Supervisor {
  /**
   * Informs the supervisor of a fault.
   *
   * @param error The fault
   * @param supervised The faulted actor
   */
  inform(error: Error, supervised: Supervised): Promise<void>

  supervisionStrategy(): Promise<SupervisionStrategy>
}

/**
 * Supervised view of an actor on a local stage.
 *
 * INTERNAL: created by LocalEnvelope when a delivery faults.
 */
export class StageSupervisedActor<M extends Message, S> implements Supervised {
  private readonly _actor: Actor<M, S>
  private readonly _error: Error

  constructor(actor: Actor<M, S>, error: Error) {
    this._actor = actor
    this._error = error
  }

  actor(): ActorRef<Message> {
    return this._actor.self()
  }

  address(): Address {
    return this._actor.address()
  }

  error(): Error {
    return this._error
  }

  logger(): Logger {
    return this._actor.logger()
  }

  async restart(): Promise<void> {
    try {
      await this._actor.restartWith(this._error)
      this._actor.environment().mailbox().resume()
    } catch (error: unknown) {
      const errorObj = error instanceof Error ? error : new Error(String(error))
      this.logger().error(`Restart failed: ${errorObj.message}`, errorObj)
      await this._actor.stop()
    }
  }

  resume(): void {
    try {
      this._actor.beforeResume(this._error)
    } catch (error: unknown) {
      const errorObj = error instanceof Error ? error : new Error(String(error))
      this.logger().error(`Actor beforeResume() failed: ${errorObj.message}`, errorObj)
    }

    this._actor.resumed()
    this._actor.environment().mailbox().resume()
    this.logger().log('Actor resumed after error: ' + this._error.message)
  }

  stop(): Promise<void> {
    return this._actor.stop()
  }
}
