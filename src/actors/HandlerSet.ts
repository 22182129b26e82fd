// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { BehaviorContext } from './BehaviorContext.js'
import { isMessageOfType, type Message, type MessageOfType, type MessageType } from './Message.js'

/**
 * Optional predicate narrowing which messages of a registered type are
 * accepted.
 *
 * Guards receive the message and a read-only view of the actor's state.
 * They must be pure: the dispatcher may evaluate a guard and then choose a
 * different registration, so a guard must never change actor state.
 */
export type Guard<T, S> = (message: T, state: Readonly<S>) => boolean

/**
 * Handler invoked for a matched message.
 *
 * Actions run to completion before the next message is taken from the
 * mailbox. A returned promise is awaited by the runtime; behavior changes
 * requested through the context apply once it settles successfully.
 */
export type Action<T, M extends Message, S> = (message: T, context: BehaviorContext<M, S>) => void | Promise<void>

/**
 * One (message type, guard, action) entry of a HandlerSet.
 */
export interface Registration<M extends Message, S> {
  /**
   * The message type tag this registration accepts.
   */
  readonly type: MessageType<M>

  /**
   * Returns whether a guard narrows this registration.
   */
  hasGuard(): boolean

  /**
   * Returns whether the message carries this registration's type and
   * passes its guard. An absent guard always passes.
   *
   * @param message The inbound message
   * @param state Read-only view of the actor state
   */
  admits(message: M, state: Readonly<S>): boolean

  /**
   * Runs the action.
   * @param message The inbound message
   * @param context The behavior context of the current delivery
   */
  invoke(message: M, context: BehaviorContext<M, S>): void | Promise<void>
}

/**
 * Registration bound to a single message type `K`, whose guard and action
 * see the narrowed message shape.
 */
class TypedRegistration<M extends Message, S, K extends MessageType<M>> implements Registration<M, S> {
  constructor(
    readonly type: K,
    private readonly _guard: Guard<MessageOfType<M, K>, S> | undefined,
    private readonly _action: Action<MessageOfType<M, K>, M, S>
  ) {}

  hasGuard(): boolean {
    return this._guard !== undefined
  }

  admits(message: M, state: Readonly<S>): boolean {
    if (!isMessageOfType(message, this.type)) {
      return false
    }
    return this._guard === undefined || this._guard(message, state)
  }

  invoke(message: M, context: BehaviorContext<M, S>): void | Promise<void> {
    if (!isMessageOfType(message, this.type)) {
      throw new Error(`Registration for ${this.type} cannot handle: ${message.type}`)
    }
    return this._action(message, context)
  }
}

/**
 * A named, ordered, immutable collection of registrations: one behavior of
 * an actor.
 *
 * Declaration order is significant. When several registrations accept the
 * same type, the first whose guard passes handles the message. No check for
 * duplicate types is made.
 *
 * HandlerSets are plain values. They do not capture an actor instance; the
 * actor's state reaches actions through the BehaviorContext. The same
 * HandlerSet may therefore be shared by every instance of an actor type and
 * compared by identity.
 *
 * @example
 * ```typescript
 * const paused = handlers<ChartMessage, ChartState>('Paused')
 *   .match('Metric', (_metric, { state }) => { state.points.push(0) })
 *   .match('TogglePause', (_toggle, context) => context.unbecome())
 *   .build()
 * ```
 */
export class HandlerSet<M extends Message, S> {
  private readonly _name: string
  private readonly _registrations: readonly Registration<M, S>[]

  /**
   * Builds a HandlerSet from registrations in the given order.
   * @param name Behavior name, used in diagnostics
   * @param registrations Ordered registrations (copied)
   * @returns A new immutable HandlerSet
   */
  static build<M extends Message, S>(name: string, registrations: readonly Registration<M, S>[]): HandlerSet<M, S> {
    return new HandlerSet<M, S>(name, registrations)
  }

  private constructor(name: string, registrations: readonly Registration<M, S>[]) {
    this._name = name
    this._registrations = Object.freeze([...registrations])
  }

  name(): string {
    return this._name
  }

  /**
   * Returns the registrations in declaration order.
   */
  registrations(): readonly Registration<M, S>[] {
    return this._registrations
  }

  size(): number {
    return this._registrations.length
  }

  /**
   * Returns whether any registration accepts the given type tag,
   * regardless of guards.
   * @param type Message type tag
   */
  handles(type: string): boolean {
    return this._registrations.some(registration => registration.type === type)
  }

  toString(): string {
    return `HandlerSet[${this._name}: ${this._registrations.map(r => r.hasGuard() ? r.type + '?' : r.type).join(', ')}]`
  }
}

/**
 * Thrown when a builder is used after build().
 */
export class HandlerSetSealedError extends Error {
  constructor(name: string) {
    super(`HandlerSet already built: ${name}`)
    this.name = 'HandlerSetSealedError'
  }
}

/**
 * Fluent builder collecting registrations for one HandlerSet.
 *
 * A builder produces exactly one HandlerSet; there is no incremental add to
 * a published set.
 */
export class HandlerSetBuilder<M extends Message, S> {
  private readonly _name: string
  private readonly _registrations: Registration<M, S>[] = []
  private _sealed = false

  constructor(name: string) {
    this._name = name
  }

  /**
   * Registers an unguarded action for messages tagged `type`.
   * @param type Message type tag
   * @param action Action receiving the narrowed message
   * @returns This builder
   */
  match<K extends MessageType<M>>(type: K, action: Action<MessageOfType<M, K>, M, S>): this {
    return this.register(new TypedRegistration<M, S, K>(type, undefined, action))
  }

  /**
   * Registers an action for messages tagged `type` that pass `guard`.
   * @param type Message type tag
   * @param guard Pure predicate over the message and read-only state
   * @param action Action receiving the narrowed message
   * @returns This builder
   */
  matchWhen<K extends MessageType<M>>(
    type: K,
    guard: Guard<MessageOfType<M, K>, S>,
    action: Action<MessageOfType<M, K>, M, S>
  ): this {
    return this.register(new TypedRegistration<M, S, K>(type, guard, action))
  }

  /**
   * Seals the builder and returns the HandlerSet.
   * @throws HandlerSetSealedError if already built
   */
  build(): HandlerSet<M, S> {
    this.ensureOpen()
    this._sealed = true
    return HandlerSet.build(this._name, this._registrations)
  }

  private register(registration: Registration<M, S>): this {
    this.ensureOpen()
    this._registrations.push(registration)
    return this
  }

  private ensureOpen(): void {
    if (this._sealed) {
      throw new HandlerSetSealedError(this._name)
    }
  }
}

/**
 * Starts a HandlerSet declaration.
 *
 * @param name Behavior name
 * @returns A new builder
 */
export function handlers<M extends Message, S = undefined>(name: string): HandlerSetBuilder<M, S> {
  return new HandlerSetBuilder<M, S>(name)
}
