// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { HandlerSet } from './HandlerSet.js'
import type { Message } from './Message.js'

/**
 * Thrown by current() on a stack that was never reset to an initial behavior.
 */
export class UninitializedBehaviorStackError extends Error {
  constructor() {
    super('Behavior stack has no initial behavior')
    this.name = 'UninitializedBehaviorStackError'
  }
}

/**
 * Per-actor stack of HandlerSets. The top element is the active behavior.
 *
 * While its actor is alive the stack is never empty: the runtime resets it
 * to the actor's initial behavior on start and on restart, and unbecome()
 * never pops that bottom element.
 *
 * Not synchronized. Only the owning actor's message delivery mutates it,
 * and only between one dispatch and the next.
 */
export class BehaviorStack<M extends Message, S> {
  private readonly _handlerSets: HandlerSet<M, S>[] = []

  /**
   * Makes `handlerSet` the active behavior.
   *
   * - discardPrevious true (default): replaces the top; depth unchanged and
   *   the previous top is gone for good
   * - discardPrevious false: pushes on top; depth + 1 and the previous top
   *   is restored by the next unbecome()
   *
   * @param handlerSet The new active behavior
   * @param discardPrevious Whether to replace rather than push
   */
  become(handlerSet: HandlerSet<M, S>, discardPrevious: boolean = true): void {
    if (discardPrevious && this._handlerSets.length > 0) {
      this._handlerSets[this._handlerSets.length - 1] = handlerSet
    } else {
      this._handlerSets.push(handlerSet)
    }
  }

  /**
   * Reverts to the previous behavior. At depth 1 this is a no-op: the
   * initial behavior can never be popped.
   */
  unbecome(): void {
    if (this._handlerSets.length > 1) {
      this._handlerSets.pop()
    }
  }

  /**
   * Returns the active behavior.
   * @throws UninitializedBehaviorStackError if the stack was never reset
   */
  current(): HandlerSet<M, S> {
    const top = this._handlerSets[this._handlerSets.length - 1]
    if (top === undefined) {
      throw new UninitializedBehaviorStackError()
    }
    return top
  }

  /**
   * Clears the stack to exactly `initial`.
   * Used by the runtime on start and restart; not for application code.
   *
   * @param initial The actor's initial behavior
   */
  reset(initial: HandlerSet<M, S>): void {
    this._handlerSets.length = 0
    this._handlerSets.push(initial)
  }

  /**
   * Empties the stack. Used when the actor stops.
   */
  clear(): void {
    this._handlerSets.length = 0
  }

  depth(): number {
    return this._handlerSets.length
  }

  isInitialized(): boolean {
    return this._handlerSets.length > 0
  }

  /**
   * Returns behavior names from bottom to top, for diagnostics.
   */
  names(): string[] {
    return this._handlerSets.map(handlerSet => handlerSet.name())
  }

  toString(): string {
    return 'BehaviorStack[' + this.names().join(' > ') + ']'
  }
}
