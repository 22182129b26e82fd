// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef } from './ActorRef.js'
import type { Logger } from './Logger.js'
import type { Message } from './Message.js'

/**
 * Why a message became a dead letter.
 *
 * - stopped: the target actor was stopped (or stopped while the message was queued)
 * - unhandled: no registration of the target's active behavior accepted it
 */
export type DeadLetterReason = 'stopped' | 'unhandled'

/**
 * A message that could not be processed by its target actor.
 */
export class DeadLetter {
  private readonly _to: ActorRef<Message>
  private readonly _representation: string
  private readonly _reason: DeadLetterReason
  private readonly _behavior: string | undefined

  /**
   * Creates a dead letter.
   * @param to The target actor
   * @param representation String representation of the message
   * @param reason Why delivery failed
   * @param behavior Name of the active behavior, for unhandled messages
   */
  constructor(to: ActorRef<Message>, representation: string, reason: DeadLetterReason, behavior?: string) {
    this._to = to
    this._representation = representation
    this._reason = reason
    this._behavior = behavior
  }

  to(): ActorRef<Message> {
    return this._to
  }

  representation(): string {
    return this._representation
  }

  reason(): DeadLetterReason {
    return this._reason
  }

  /**
   * Returns the active behavior name for unhandled messages, else undefined.
   */
  behavior(): string | undefined {
    return this._behavior
  }

  toString(): string {
    const behavior = this._behavior !== undefined ? ' behavior: ' + this._behavior : ''

    return 'DeadLetter[to: ' + this._to.type() +
           ' at: ' + this._to.address() +
           ' subject: ' + this._representation +
           ' reason: ' + this._reason +
           behavior +
           ']'
  }
}

/**
 * Listener interface for dead letter notifications.
 *
 * Registered via DeadLetters.registerListener().
 */
export interface DeadLettersListener {
  /**
   * Handles a dead letter notification.
   * @param deadLetter The dead letter to process
   */
  handle(deadLetter: DeadLetter): void
}

/**
 * Stage-wide sink for messages that were not processed.
 *
 * Each dead letter is logged and then passed to the registered listeners in
 * registration order. A listener that throws is logged and skipped.
 */
export class DeadLetters {
  private readonly _logger: Logger
  private _listeners: DeadLettersListener[] = []

  constructor(logger: Logger) {
    this._logger = logger
  }

  /**
   * Logs the dead letter and notifies all listeners.
   * @param deadLetter The dead letter to process
   */
  failedDelivery(deadLetter: DeadLetter): void {
    if (deadLetter.reason() === 'unhandled') {
      this._logger.warn(deadLetter.toString())
    } else {
      this._logger.error(deadLetter.toString())
    }

    this._listeners.forEach((listener: DeadLettersListener) => {
      try {
        listener.handle(deadLetter)
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error)
        this._logger.error('DeadLetter: Listener crashed because: ' + message, error)
      }
    })
  }

  /**
   * Registers a listener for dead letter notifications.
   * @param listener The listener to register
   */
  registerListener(listener: DeadLettersListener): void {
    this._listeners.push(listener)
  }

  /**
   * Removes a previously registered listener.
   * @param listener The listener to remove
   */
  deregisterListener(listener: DeadLettersListener): void {
    this._listeners = this._listeners.filter(registered => registered !== listener)
  }
}
