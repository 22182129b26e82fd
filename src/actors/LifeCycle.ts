// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Environment } from './Environment.js'

/**
 * Runtime status of an actor.
 *
 * Starting -> Running -> (Restarting -> Starting -> Running)* -> Stopped
 */
export enum ActorStatus {
  /** Initial behavior installed; start hook pending or running */
  Starting = 'starting',
  /** Processing messages */
  Running = 'running',
  /** Restart in progress: state and behavior stack being reset */
  Restarting = 'restarting',
  /** Terminal: mailbox closed, behavior stack discarded */
  Stopped = 'stopped'
}

/**
 * Abstract base class providing actor lifecycle management.
 *
 * Hook methods for customization:
 * - beforeStart/afterStop: initialization and cleanup
 * - beforeRestart/afterRestart: failure recovery
 * - beforeResume: resumption after a supervised fault
 * - beforeStop: pre-shutdown cleanup
 *
 * Default hooks log the lifecycle event. Hook failures are logged and never
 * prevent the lifecycle transition.
 */
export abstract class LifeCycle {
  private readonly _environment: Environment
  private _status: ActorStatus

  /**
   * @param environment The actor's runtime environment
   */
  protected constructor(environment: Environment) {
    this._environment = environment
    this._status = ActorStatus.Starting
  }

  environment(): Environment {
    return this._environment
  }

  status(): ActorStatus {
    return this._status
  }

  /**
   * Called once the initial behavior is installed, before the start hook
   * is delivered.
   */
  beforeStart(): void {
    this.environment().logger().log(this.id() + ' subject: beforeStart()')
  }

  /**
   * Called after the mailbox is closed and the actor left the directory.
   */
  afterStop(): void {
    this.environment().logger().log(this.id() + ' subject: afterStop()')
  }

  /**
   * Called before state and behaviors are reset by a restart.
   * @param reason The error that caused the restart
   */
  beforeRestart(reason: Error): void {
    this.environment().logger().log(this.id() + ' subject: beforeRestart(): ', reason)
  }

  /**
   * Called after state and behaviors were reset, before the start hook runs again.
   * @param reason The error that caused the restart
   */
  afterRestart(reason: Error): void {
    this.environment().logger().log(this.id() + ' subject: afterRestart(): ', reason)
  }

  /**
   * Called before the mailbox resumes after a supervised fault.
   * @param reason The error that was handled
   */
  beforeResume(reason: Error): void {
    this.environment().logger().log(this.id() + ' subject: beforeResume(): ', reason)
  }

  /**
   * Called before the actor stops. May return a promise for async cleanup.
   */
  beforeStop(): void | Promise<void> {
    this.environment().logger().log(this.id() + ' subject: beforeStop()')
  }

  /**
   * Stops the actor.
   *
   * 1. Calls beforeStop() (awaited if it returns a promise)
   * 2. Closes the mailbox; queued messages become dead letters
   * 3. Removes the actor from the stage directory
   * 4. Calls afterStop()
   *
   * Stopping a stopped actor does nothing.
   */
  async stop(): Promise<void> {
    if (this.isStopped()) {
      return
    }

    try {
      await this.beforeStop()
    } catch (error: unknown) {
      this.hookFailed('beforeStop', error)
    }

    this._status = ActorStatus.Stopped
    this.environment().mailbox().close()
    this.environment().stage().removeFromDirectory(this.environment().address())

    this.environment().logger().log(this.id() + ' subject: stop()')

    try {
      this.afterStop()
    } catch (error: unknown) {
      this.hookFailed('afterStop', error)
    }
  }

  /**
   * An actor is stopped once its mailbox is closed.
   */
  isStopped(): boolean {
    return this.environment().mailbox().isClosed()
  }

  /**
   * Formatted actor id for log lines, e.g. "To: Session At: Address: 3".
   */
  protected id(): string {
    return this.environment().stage().idFrom(this.environment())
  }

  protected transitionTo(status: ActorStatus): void {
    if (this._status !== ActorStatus.Stopped) {
      this._status = status
    }
  }

  protected hookFailed(hook: string, error: unknown): void {
    const errorObj = error instanceof Error ? error : new Error(String(error))
    this.environment().logger().error(
      `Actor ${hook}() failed: ${errorObj.message}`,
      errorObj
    )
  }
}
