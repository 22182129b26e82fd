// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef, BehaviorSnapshot } from './ActorRef.js'
import { LocalActorRef } from './ActorRef.js'
import type { Address } from './Address.js'
import { type BehaviorContext, DeliveryContext } from './BehaviorContext.js'
import { BehaviorStack } from './BehaviorStack.js'
import { DeadLetter, type DeadLetters } from './DeadLetters.js'
import type { Definition } from './Definition.js'
import { dispatch } from './Dispatcher.js'
import { Environment } from './Environment.js'
import type { HandlerSet } from './HandlerSet.js'
import { ActorStatus, LifeCycle } from './LifeCycle.js'
import type { Logger } from './Logger.js'
import { type Message, representationOf } from './Message.js'
import { ObservableState } from './ObservableState.js'
import type { Stage } from './Stage.js'

/**
 * Abstract base class of all actors.
 *
 * An actor declares its message protocol `M`, its private state record `S`,
 * its initial state and its initial behavior. Behaviors are HandlerSets,
 * usually declared as module-level values next to the actor:
 *
 * ```typescript
 * type ChartMessage = { type: 'Metric', value: number } | { type: 'TogglePause' }
 * interface ChartState { points: number[] }
 *
 * const charting: HandlerSet<ChartMessage, ChartState> = handlers<ChartMessage, ChartState>('Charting')
 *   .match('Metric', (metric, { state }) => { state.points.push(metric.value) })
 *   .match('TogglePause', (_toggle, context) => context.become(paused, false))
 *   .build()
 *
 * const paused: HandlerSet<ChartMessage, ChartState> = handlers<ChartMessage, ChartState>('Paused')
 *   .match('Metric', (_metric, { state }) => { state.points.push(0) })
 *   .match('TogglePause', (_toggle, context) => context.unbecome())
 *   .build()
 *
 * class ChartActor extends Actor<ChartMessage, ChartState> {
 *   constructor() { super() }
 *   protected initialState(): ChartState { return { points: [] } }
 *   protected initialBehavior(): HandlerSet<ChartMessage, ChartState> { return charting }
 * }
 *
 * const chart = stage().actorFor(protocolOf('Chart', () => new ChartActor()))
 * chart.tell({ type: 'Metric', value: 42 })
 * ```
 *
 * The runtime guarantees that at most one message per actor is being
 * processed at any time, and that behavior changes requested by an action
 * take effect after it returns and before the next message is dispatched.
 *
 * Actors are created via stage.actorFor() and must not be instantiated directly.
 */
export abstract class Actor<M extends Message, S = undefined> extends LifeCycle {
  private readonly _behaviors: BehaviorStack<M, S>
  private readonly _self: ActorRef<M>
  private _state: { value: S } | undefined

  /**
   * Actors receive their environment from the stage through
   * Environment.retrieveEnvironment(). Subclass constructors call super()
   * and then initialize their own fields.
   */
  protected constructor() {
    super(Environment.retrieveEnvironment())
    this._behaviors = new BehaviorStack<M, S>()
    this._self = new LocalActorRef<M, S>(this)
    this._state = undefined
  }

  /**
   * Returns a fresh state record. Called on start and on every restart.
   */
  protected abstract initialState(): S

  /**
   * Returns the behavior installed on start and on every restart.
   */
  protected abstract initialBehavior(): HandlerSet<M, S>

  /**
   * Start hook, delivered as the first mailbox entry after start and after
   * every restart. May request behavior changes or send messages, e.g. to ask
   * an external collaborator for data whose answer arrives as a later message.
   *
   * @param _context The behavior context of the start delivery
   */
  protected started(_context: BehaviorContext<M, S>): void | Promise<void> {
    // Implement in subclass
  }

  /**
   * Handles a message that no registration of the active behavior accepted.
   *
   * Default applies the environment's UnhandledPolicy:
   * - 'dead-letter': logged and routed to dead letters
   * - 'log': logged as a warning
   * - 'drop': ignored
   *
   * @param message The unhandled message
   * @param behavior The active behavior
   */
  protected unhandled(message: M, behavior: HandlerSet<M, S>): void {
    switch (this.environment().unhandledPolicy()) {
      case 'dead-letter':
        this.deadLetters().failedDelivery(
          new DeadLetter(this._self, representationOf(message), 'unhandled', behavior.name())
        )
        break

      case 'log':
        this.logger().warn(`${this.id()} unhandled: ${representationOf(message)} in behavior: ${behavior.name()}`)
        break

      case 'drop':
        break
    }
  }

  /**
   * Exposes selected state values through inspect().
   * Return copies, not internal references.
   *
   * @param _state The current state
   * @returns The observable state (empty by default)
   */
  protected observableState(_state: Readonly<S>): ObservableState {
    return new ObservableState()
  }

  //================================
  // identity and runtime services
  //================================

  address(): Address {
    return this.environment().address()
  }

  deadLetters(): DeadLetters {
    return this.stage().deadLetters()
  }

  definition(): Definition {
    return this.environment().definition()
  }

  logger(): Logger {
    return this.environment().logger()
  }

  /**
   * Returns this actor's reference, as handed out by the stage.
   */
  self(): ActorRef<M> {
    return this._self
  }

  stage(): Stage {
    return this.environment().stage()
  }

  /**
   * Returns the state record.
   * @throws Error if the actor has not been initialized by the stage
   */
  state(): S {
    if (this._state === undefined) {
      throw new Error(`State of ${this.type()} accessed before start`)
    }
    return this._state.value
  }

  type(): string {
    return this.definition().type()
  }

  toString(): string {
    return `${this.type()}: ${this.id()}`
  }

  //================================
  // runtime (INTERNAL)
  //================================

  /**
   * Installs fresh state and the initial behavior, then calls beforeStart().
   *
   * INTERNAL: called once by the stage right after instantiation.
   */
  initialize(): void {
    this._state = { value: this.initialState() }
    this._behaviors.reset(this.initialBehavior())
    this.transitionTo(ActorStatus.Starting)

    try {
      this.beforeStart()
    } catch (error: unknown) {
      this.hookFailed('beforeStart', error)
    }
  }

  /**
   * Runs started() with a fresh context, applies its behavior changes and
   * enters Running.
   *
   * INTERNAL: delivered through the mailbox on start; called directly by restartWith().
   */
  async runStartHook(): Promise<void> {
    const context = new DeliveryContext<M, S>(this, this._behaviors.current())
    try {
      await this.started(context)
      if (!this.isStopped()) {
        context.commitTo(this._behaviors)
      }
    } finally {
      context.close()
    }
    this.transitionTo(ActorStatus.Running)
  }

  /**
   * Dispatches one message to the active behavior.
   *
   * An unhandled message goes to unhandled(). A handled message's action is
   * awaited if it returned a promise, then its behavior changes are applied.
   * A failing guard or action propagates to the caller (the envelope), which
   * reports the fault; its behavior changes are dropped.
   *
   * INTERNAL: called by message envelopes only.
   *
   * @param message The message to process
   */
  async receive(message: M): Promise<void> {
    const behavior = this._behaviors.current()
    const context = new DeliveryContext<M, S>(this, behavior)

    try {
      const outcome = dispatch(behavior, message, context)

      if (outcome.kind === 'unhandled') {
        this.unhandled(message, behavior)
        return
      }

      if (outcome.completion !== undefined) {
        await outcome.completion
      }

      if (!this.isStopped()) {
        context.commitTo(this._behaviors)
      }
    } finally {
      context.close()
    }
  }

  /**
   * Restarts the actor in place: beforeRestart(), fresh state, behavior stack
   * reset to the initial behavior, afterRestart(), then the start hook.
   * All intermediate behaviors are discarded.
   *
   * INTERNAL: called by supervision (mailbox suspended) or by a restart
   * envelope (in mailbox order), never concurrently with a delivery.
   *
   * @param reason The error that caused the restart
   */
  async restartWith(reason: Error): Promise<void> {
    if (this.isStopped()) {
      return
    }

    this.transitionTo(ActorStatus.Restarting)

    try {
      this.beforeRestart(reason)
    } catch (error: unknown) {
      this.hookFailed('beforeRestart', error)
    }

    this._state = { value: this.initialState() }
    this._behaviors.reset(this.initialBehavior())

    this.logger().log(this.id() + ' subject: restart()')

    try {
      this.afterRestart(reason)
    } catch (error: unknown) {
      this.hookFailed('afterRestart', error)
    }

    this.transitionTo(ActorStatus.Starting)
    await this.runStartHook()
  }

  /**
   * Enters Running after a supervised fault was resumed, including a fault
   * of the start hook, which never reached Running on its own.
   *
   * INTERNAL: called by supervision before the mailbox resumes.
   */
  resumed(): void {
    this.transitionTo(ActorStatus.Running)
  }

  /**
   * Describes the active behaviors and observable state.
   *
   * INTERNAL: delivered through the mailbox by ActorRef.inspect().
   */
  snapshot(): BehaviorSnapshot {
    return {
      type: this.type(),
      address: this.address().valueAsString(),
      status: this.status(),
      behaviors: this._behaviors.names(),
      current: this._behaviors.current().name(),
      depth: this._behaviors.depth(),
      state: this.observableState(this.state()).snapshot()
    }
  }

  /**
   * Stops the actor and discards its behavior stack.
   */
  override async stop(): Promise<void> {
    await super.stop()
    this._behaviors.clear()
  }
}
