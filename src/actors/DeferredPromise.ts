// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * A promise together with the functions that settle it.
 * Used for requests answered later by a mailbox delivery (inspect, restart).
 */
export interface DeferredPromise<T> {
  promise: Promise<T>
  resolve(value: T): void
  reject(reason: Error): void
}

/**
 * Creates a new unsettled deferred promise.
 */
export function createDeferred<T>(): DeferredPromise<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (reason: Error) => void = () => {}

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}
