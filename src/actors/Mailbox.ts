// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Envelope } from './Envelope.js'

/**
 * Envelope queue of one actor.
 *
 * Key characteristics:
 * - FIFO: envelopes are delivered in send order
 * - At most one envelope is in delivery at a time; the next is not taken
 *   until the current delivery completes
 * - Suspension queues envelopes without delivering them
 * - Closing hands queued and later envelopes to undeliverable()
 */
export interface Mailbox {
  /**
   * Closes the mailbox and drains queued envelopes as undeliverable.
   */
  close(): void

  isClosed(): boolean

  /**
   * Suspends delivery. Envelopes are still queued.
   */
  suspend(): void

  /**
   * Resumes delivery and drains anything queued meanwhile.
   */
  resume(): void

  isSuspended(): boolean

  /**
   * Delivers queued envelopes one at a time until the queue is empty or the
   * mailbox is suspended or closed. Returns at once if a delivery loop is
   * already running.
   */
  dispatch(): Promise<void>

  /**
   * Returns true if not closed, not suspended, and envelopes are queued.
   */
  isReceivable(): boolean

  /**
   * Dequeues the next envelope.
   * @returns The next envelope or EmptyEnvelope if none
   */
  receive(): Envelope

  /**
   * Enqueues an envelope and triggers delivery unless suspended.
   * @param envelope The envelope to send
   */
  send(envelope: Envelope): void

  /**
   * Returns the number of queued envelopes.
   */
  pendingCount(): number
}
