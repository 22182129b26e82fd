// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Base shape of every message an actor receives.
 *
 * The `type` tag is the runtime-discoverable type identity used by the
 * dispatcher to select registrations. Application protocols are written as
 * discriminated unions of message shapes:
 *
 * ```typescript
 * type ChartMessage =
 *   | { readonly type: 'Metric', readonly value: number }
 *   | { readonly type: 'TogglePause' }
 * ```
 *
 * Messages are treated as immutable once sent.
 */
export interface Message {
  readonly type: string
}

/**
 * The union of type tags of a message protocol.
 */
export type MessageType<M extends Message> = M['type']

/**
 * The member of message protocol `M` tagged with `K`.
 */
export type MessageOfType<M extends Message, K extends MessageType<M>> = Extract<M, { readonly type: K }>

/**
 * Narrows a message to the protocol member tagged with `type`.
 * @param message The message to test
 * @param type The expected type tag
 * @returns true if the message carries the tag
 */
export function isMessageOfType<M extends Message, K extends MessageType<M>>(
  message: M,
  type: K
): message is MessageOfType<M, K> {
  return message.type === type
}

/**
 * Returns a human-readable representation of a message for logging and
 * dead letters, e.g. `Metric{"value":3}` or `TogglePause`.
 *
 * @param message The message to represent
 * @returns String representation
 */
export function representationOf(message: Message): string {
  const { type, ...payload } = message

  if (Object.keys(payload).length === 0) {
    return type
  }

  try {
    return type + JSON.stringify(payload)
  } catch {
    // circular or BigInt payloads
    return type + '{...}'
  }
}
