/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

type Handler<A extends unknown[]> = (...args: A) => void | Promise<void>

/**
 * A typed, in-process event. Pollers use these to report samples and
 * failures upwards without knowing who is listening.
 */
export class Event<A extends unknown[]> {
  private handlers: Set<Handler<A>> = new Set()

  get isEmpty(): boolean {
    return this.handlers.size === 0
  }

  get subscribers(): number {
    return this.handlers.size
  }

  /**
   * Make sure you unsubscribe using [[Event.off]]
   */
  on(handler: Handler<A>): void {
    this.handlers.add(handler)
  }

  /**
   * @returns true if the handler was removed
   */
  off(handler: Handler<A>): boolean {
    return this.handlers.delete(handler)
  }

  once(handler: Handler<A>): void {
    const wrapper = (...args: A): void | Promise<void> => {
      this.off(wrapper)
      return handler(...args)
    }
    this.handlers.add(wrapper)
  }

  emit(...args: A): void {
    void this.emitAsync(...args)
  }

  /**
   * Calls every handler and awaits the async ones
   */
  async emitAsync(...args: A): Promise<void> {
    const promises = []

    for (const handler of Array.from(this.handlers)) {
      if (this.handlers.has(handler)) {
        promises.push(handler(...args))
      }
    }

    await Promise.all(promises)
  }

  clear(): void {
    this.handlers.clear()
  }
}

/**
 * Resolves with the arguments of the next emit
 */
export const waitForEmit = <T extends unknown[]>(event: Event<T>): Promise<T> => {
  return new Promise((resolve) => {
    event.once((...args: T) => resolve(args))
  })
}
