// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Factory for actor addresses.
 *
 * Address classes expose a static unique() so the class itself can be
 * passed wherever an AddressFactory is expected:
 *
 * ```typescript
 * const config: StageConfig = { ...StageConfigs.DEFAULT, addressFactory: NumericAddress }
 * ```
 */
export interface AddressFactory {
  /**
   * Generates a unique address.
   * @returns A newly created unique address
   */
  unique(): Address
}

/**
 * Unique identifier of an actor within its stage.
 *
 * Addresses are immutable and provide equality and hashing for use
 * as directory keys and in dead letters and log lines.
 */
export interface Address {
  /**
   * Returns the raw address value.
   */
  value(): string | number

  /**
   * Returns the address value as a string.
   */
  valueAsString(): string

  /**
   * Compares this address with another for equality.
   * @param other Address to compare with
   * @returns true if the values are equal
   */
  equals(other: Address): boolean

  /**
   * Returns a hash code used for directory sharding.
   */
  hashCode(): number

  /**
   * Returns a formatted string, e.g. "Address: 7".
   */
  toString(): string
}
