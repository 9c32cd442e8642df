/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type PromiseResolve<T> = (value: T) => void
export type PromiseReject = (error?: unknown) => void

export class PromiseUtils {
  /**
   * Creates a pending promise and hands back its resolve and reject
   * functions so that later code can settle it.
   */
  static split<T>(): [Promise<T>, PromiseResolve<T>, PromiseReject] {
    let resolve: PromiseResolve<T> = () => undefined
    let reject: PromiseReject = () => undefined

    const promise = new Promise<T>((res, rej) => {
      resolve = res
      reject = rej
    })

    return [promise, resolve, reject]
  }

  static sleep(timeMs: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, timeMs))
  }
}
