// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from './Address.js'

/**
 * Identity of an actor being created: its type name and address.
 *
 * Created by the stage in actorFor() and passed to the protocol's
 * instantiator.
 */
export class Definition {
  /**
   * @param _type Actor type identifier (the protocol's type)
   * @param _address Unique address for the actor
   */
  constructor(
    private readonly _type: string,
    private readonly _address: Address
  ) {}

  type(): string {
    return this._type
  }

  address(): Address {
    return this._address
  }

  toString(): string {
    return `Definition[type: ${this._type} address: ${this._address.valueAsString()}]`
  }
}
