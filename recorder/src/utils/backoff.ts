/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type BackoffStrategy = {
  /**
   * The first delay, in milliseconds
   */
  delay: number
  maxDelay: number
  /**
   * Fraction of the current delay added at random, 0 disables jitter
   */
  jitter: number
}

/**
 * Exponential backoff that doubles from `delay` up to `maxDelay`
 */
export class Backoff {
  private readonly strategy: BackoffStrategy

  private attempt: number

  constructor(strategy: BackoffStrategy) {
    this.strategy = strategy
    this.attempt = 0
  }

  get attempts(): number {
    return this.attempt
  }

  next(): number {
    // growth stops once the undelayed step reaches maxDelay
    const ceiling = Math.max(0, Math.ceil(Math.log2(this.strategy.maxDelay / this.strategy.delay)))
    const exponent = 2 ** Math.min(this.attempt, Number.isFinite(ceiling) ? ceiling : 0)
    const delay = this.strategy.delay * (exponent + exponent * this.strategy.jitter * Math.random())
    this.attempt += 1
    return Math.min(delay, this.strategy.maxDelay)
  }

  reset(): void {
    this.attempt = 0
  }
}
