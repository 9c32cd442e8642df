/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type MutexUnlockFunction = () => void

export class Mutex {
  private mutex = Promise.resolve()
  private waiting = 0

  /**
   * Number of callers holding or queued for the lock
   */
  get pending(): number {
    return this.waiting
  }

  lock(): PromiseLike<MutexUnlockFunction> {
    let begin: (unlock: MutexUnlockFunction) => void = () => undefined
    this.waiting++

    this.mutex = this.mutex.then(() => {
      return new Promise(begin)
    })

    return new Promise<MutexUnlockFunction>((resolve) => {
      begin = (unlock) =>
        resolve(() => {
          this.waiting--
          unlock()
        })
    })
  }

  async dispatch<T>(fn: (() => T) | (() => PromiseLike<T>)): Promise<T> {
    const unlock = await this.lock()
    try {
      return await Promise.resolve(fn())
    } finally {
      unlock()
    }
  }
}
