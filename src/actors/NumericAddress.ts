// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from './Address.js'

let nextValue = 1

/**
 * Sequential numeric address starting at 1.
 *
 * Readable in logs and predictable in tests; unique only within one process.
 *
 * @example
 * ```typescript
 * const stage = new LocalStage({ ...StageConfigs.QUIET, addressFactory: NumericAddress })
 * ```
 */
export class NumericAddress implements Address {
  private readonly _value: number

  static unique(): Address {
    return new NumericAddress()
  }

  constructor() {
    this._value = nextValue++
  }

  value(): number {
    return this._value
  }

  valueAsString(): string {
    return '' + this._value
  }

  equals(other: Address): boolean {
    return this._value === other.value()
  }

  hashCode(): number {
    return 31 * this._value
  }

  toString(): string {
    return 'Address: ' + this._value
  }
}
