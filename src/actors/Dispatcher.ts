// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { BehaviorContext } from './BehaviorContext.js'
import type { HandlerSet } from './HandlerSet.js'
import type { Message } from './Message.js'

/**
 * A registration matched and its action was invoked.
 */
export interface Handled<M extends Message, S> {
  readonly kind: 'handled'
  readonly handlerSet: HandlerSet<M, S>
  /** Declaration index of the matched registration */
  readonly index: number
  /** The action's returned promise, if it returned one */
  readonly completion: Promise<void> | undefined
}

/**
 * No registration of the HandlerSet accepted the message.
 */
export interface Unhandled<M extends Message, S> {
  readonly kind: 'unhandled'
  readonly handlerSet: HandlerSet<M, S>
  readonly message: M
}

export type DispatchOutcome<M extends Message, S> = Handled<M, S> | Unhandled<M, S>

/**
 * Resolves `message` against `handlerSet` and invokes the matching action.
 *
 * Registrations are scanned in declaration order. The first whose type tag
 * equals the message's and whose guard passes (an absent guard passes) is the
 * match; its action is invoked synchronously with the message and context.
 * Later registrations are not consulted, and their guards are not evaluated.
 *
 * What to do with an Unhandled outcome is up to the caller. A guard or action
 * that throws propagates out of dispatch().
 *
 * @param handlerSet The active behavior
 * @param message The inbound message
 * @param context The behavior context handed to the action
 * @returns The dispatch outcome
 */
export function dispatch<M extends Message, S>(
  handlerSet: HandlerSet<M, S>,
  message: M,
  context: BehaviorContext<M, S>
): DispatchOutcome<M, S> {
  const registrations = handlerSet.registrations()

  for (let index = 0; index < registrations.length; index++) {
    const registration = registrations[index]
    if (registration === undefined || registration.type !== message.type) {
      continue
    }
    if (registration.admits(message, context.state)) {
      const result = registration.invoke(message, context)
      return {
        kind: 'handled',
        handlerSet,
        index,
        completion: result instanceof Promise ? result : undefined
      }
    }
  }

  return { kind: 'unhandled', handlerSet, message }
}
