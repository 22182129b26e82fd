// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { DeadLetter, DeadLetterReason, DeadLettersListener } from '../DeadLetters.js'

/**
 * Collects dead letters for assertions.
 *
 * ```typescript
 * const listener = new TestDeadLettersListener()
 * testStage.deadLetters().registerListener(listener)
 *
 * session.tell({ type: 'IncomingMessage', text: 'hi' })
 *
 * await awaitAssert(() => {
 *   expect(listener.findByReason('unhandled')).toHaveLength(1)
 * })
 * ```
 */
export class TestDeadLettersListener implements DeadLettersListener {
  private readonly deadLetters: DeadLetter[] = []

  handle(deadLetter: DeadLetter): void {
    this.deadLetters.push(deadLetter)
  }

  count(): number {
    return this.deadLetters.length
  }

  latest(): DeadLetter | undefined {
    return this.deadLetters[this.deadLetters.length - 1]
  }

  /**
   * Dead letters whose representation contains `pattern`, e.g. a message type.
   */
  findByRepresentation(pattern: string): DeadLetter[] {
    return this.deadLetters.filter(deadLetter => deadLetter.representation().includes(pattern))
  }

  findByReason(reason: DeadLetterReason): DeadLetter[] {
    return this.deadLetters.filter(deadLetter => deadLetter.reason() === reason)
  }
}
