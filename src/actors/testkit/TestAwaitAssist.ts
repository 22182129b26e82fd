// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef, BehaviorSnapshot } from '../ActorRef.js'
import type { Message } from '../Message.js'

/**
 * Polling options for the await helpers.
 */
export interface AwaitOptions {
  /** Maximum wait in milliseconds (default: 2000) */
  timeout?: number

  /** Delay between attempts in milliseconds (default: 20) */
  interval?: number
}

const pause = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Retries `assertion` until it passes or the timeout elapses, then rethrows
 * its last failure.
 *
 * ```typescript
 * await awaitAssert(() => {
 *   expect(listener.count()).toBe(1)
 * })
 * ```
 */
export async function awaitAssert(
  assertion: () => Promise<void> | void,
  options: AwaitOptions = {}
): Promise<void> {
  const { timeout = 2000, interval = 20 } = options
  const start = Date.now()
  let lastError: Error | undefined

  while (Date.now() - start < timeout) {
    try {
      await assertion()
      return
    } catch (error: unknown) {
      lastError = error instanceof Error ? error : new Error(String(error))
      await pause(interval)
    }
  }

  throw lastError ?? new Error('Assertion did not pass within timeout')
}

/**
 * Inspects `actor` until `predicate` holds for its snapshot.
 *
 * ```typescript
 * const snapshot = await awaitSnapshot(session, s => s.current === 'Authenticated')
 * expect(snapshot.depth).toBe(1)
 * ```
 *
 * @returns The first snapshot satisfying `predicate`
 */
export async function awaitSnapshot(
  actor: ActorRef<Message>,
  predicate: (snapshot: BehaviorSnapshot) => boolean,
  options: AwaitOptions = {}
): Promise<BehaviorSnapshot> {
  const { timeout = 2000, interval = 20 } = options
  const start = Date.now()

  while (Date.now() - start < timeout) {
    const snapshot = await actor.inspect()
    if (predicate(snapshot)) {
      return snapshot
    }
    await pause(interval)
  }

  const finalSnapshot = await actor.inspect()
  throw new Error(
    `Snapshot predicate not satisfied within ${timeout}ms. ` +
    `Final snapshot: ${JSON.stringify(finalSnapshot)}`
  )
}
