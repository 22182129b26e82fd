// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { EmptyEnvelope, type Envelope } from './Envelope.js'
import type { Mailbox } from './Mailbox.js'

/**
 * Unbounded FIFO mailbox backed by a JavaScript array.
 *
 * Default mailbox type used by the stage.
 *
 * A single delivery loop runs per mailbox. send() called while the loop is
 * running (including an actor sending to itself from an action) only
 * enqueues; the running loop picks the envelope up after the current
 * delivery completes.
 */
export class ArrayMailbox implements Mailbox {
  private closed: boolean
  private suspended: boolean
  private delivering: boolean
  private queue: Envelope[]

  constructor() {
    this.closed = false
    this.suspended = false
    this.delivering = false
    this.queue = []
  }

  /**
   * Closes the mailbox. Queued envelopes are drained as undeliverable.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true

    const undelivered = this.queue
    this.queue = []
    undelivered.forEach(envelope => envelope.undeliverable())
  }

  isClosed(): boolean {
    return this.closed
  }

  suspend(): void {
    this.suspended = true
  }

  /**
   * Resumes delivery and triggers dispatch if envelopes are queued.
   */
  resume(): void {
    this.suspended = false
    if (this.isReceivable()) {
      void this.dispatch()
    }
  }

  isSuspended(): boolean {
    return this.suspended
  }

  /**
   * Self-draining delivery loop. The `delivering` flag is the mailbox's
   * execution token: only one loop, and so one delivery, at a time.
   */
  async dispatch(): Promise<void> {
    if (this.delivering) {
      return
    }

    this.delivering = true
    try {
      while (this.isReceivable()) {
        const envelope = this.receive()
        if (!envelope.isDeliverable()) {
          break
        }
        // Deliver envelope (errors handled internally by envelope)
        await envelope.deliver()
      }
    } finally {
      this.delivering = false
    }

    // resumed while the previous loop was finishing
    if (this.isReceivable()) {
      void this.dispatch()
    }
  }

  isReceivable(): boolean {
    return !this.isClosed() && !this.isSuspended() && this.queue.length > 0
  }

  receive(): Envelope {
    const maybeEnvelope = this.queue.shift()

    return maybeEnvelope ? maybeEnvelope : EmptyEnvelope
  }

  /**
   * Enqueues an envelope.
   *
   * Behavior:
   * - If closed: the envelope is undeliverable
   * - If suspended: queued, not dispatched
   * - Otherwise: queued and dispatched
   *
   * @param envelope The envelope to send
   */
  send(envelope: Envelope): void {
    if (this.isClosed()) {
      envelope.undeliverable()
      return
    }

    this.queue.push(envelope)
    if (!this.isSuspended()) {
      void this.dispatch()
    }
  }

  pendingCount(): number {
    return this.queue.length
  }
}
