// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { uuidv7 } from 'uuidv7'
import type { Address } from './Address.js'

/**
 * UUIDv7 address (RFC 9562): globally unique and time-ordered, so actor
 * ids in log lines sort by creation time.
 *
 * Default address type of a stage.
 *
 * @example
 * ```typescript
 * const addr = Uuid7Address.unique()  // "018e6c7e-8e7a-7c3e-9f1a-3b2c1d0e0f1a"
 * ```
 */
export class Uuid7Address implements Address {
  private readonly _value: string

  static unique(): Address {
    return new Uuid7Address()
  }

  constructor() {
    this._value = uuidv7()
  }

  value(): string {
    return this._value
  }

  valueAsString(): string {
    return this._value
  }

  equals(other: Address): boolean {
    return this._value === other.valueAsString()
  }

  /**
   * String hash of the UUID text.
   * @returns Positive 32-bit hash code
   */
  hashCode(): number {
    let hash = 0
    for (let i = 0; i < this._value.length; i++) {
      hash = ((hash << 5) - hash) + this._value.charCodeAt(i)
      hash = hash & hash
    }
    return Math.abs(hash)
  }

  toString(): string {
    return 'Address: ' + this._value
  }
}
