// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef } from './ActorRef.js'
import type { Address } from './Address.js'
import type { Message } from './Message.js'

/**
 * Sizing of the actor directory.
 */
export interface DirectoryConfig {
  /** Number of buckets actors are spread across by address hash */
  buckets: number
}

export class DirectoryConfigs {
  static readonly DEFAULT: DirectoryConfig = {
    buckets: 32
  }
}

/**
 * Live actors of a stage, indexed by address.
 *
 * Actors are spread across buckets by address hash code, which keeps each
 * map small in stages with many actors.
 */
export class Directory {
  private readonly buckets: Map<string, ActorRef<Message>>[]

  constructor(config: DirectoryConfig = DirectoryConfigs.DEFAULT) {
    if (!Number.isInteger(config.buckets) || config.buckets < 1) {
      throw new Error(`Directory buckets must be a positive integer: ${config.buckets}`)
    }

    this.buckets = []
    for (let i = 0; i < config.buckets; i++) {
      this.buckets.push(new Map<string, ActorRef<Message>>())
    }
  }

  set(address: Address, actor: ActorRef<Message>): void {
    this.bucketFor(address).set(address.valueAsString(), actor)
  }

  get(address: Address): ActorRef<Message> | undefined {
    return this.bucketFor(address).get(address.valueAsString())
  }

  /**
   * @returns true if an actor was registered at `address`
   */
  remove(address: Address): boolean {
    return this.bucketFor(address).delete(address.valueAsString())
  }

  size(): number {
    return this.buckets.reduce((total, bucket) => total + bucket.size, 0)
  }

  all(): ActorRef<Message>[] {
    const actors: ActorRef<Message>[] = []
    for (const bucket of this.buckets) {
      actors.push(...bucket.values())
    }
    return actors
  }

  private bucketFor(address: Address): Map<string, ActorRef<Message>> {
    const index = Math.abs(address.hashCode()) % this.buckets.length
    const bucket = this.buckets[index]
    if (bucket === undefined) {
      throw new Error(`No directory bucket at index: ${index}`)
    }
    return bucket
  }
}
