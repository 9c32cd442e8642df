/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { EndpointClient, EndpointSnapshot } from '../endpoint'
import { StorageError, TransportError } from '../errors'
import { Event } from '../event'
import { DEFAULT_BACKOFF_MAX_INTERVALS } from '../fileStores'
import { createRootLogger, Logger } from '../logger'
import { createSample, InvalidSampleError, Sample } from '../primitives'
import { GapReport, SequenceTracker } from '../sequence'
import { SampleStore } from '../storage'
import { Backoff, ErrorUtils, PromiseUtils, SetTimeoutToken, TimestampUtils } from '../utils'
import { SourceConfig } from './sourceConfig'

export type PollerState = 'idle' | 'polling' | 'backoff' | 'stopping' | 'stopped'

export type PollFailure = Readonly<{
  kind: 'transport' | 'storage'
  error: TransportError | StorageError
  consecutiveFailures: number
  /** How long the poller waits before the next attempt */
  retryInMs: number
}>

export type TickOutcome =
  | { type: 'success'; sample: Sample; report: GapReport }
  | { type: 'unchanged'; sequence: number }
  | { type: 'transport-failure'; error: TransportError; retryInMs: number }
  | { type: 'storage-failure'; error: StorageError }
  /** Stopped while the fetch was in flight, nothing was stored */
  | { type: 'stopped' }

export type PollerOptions = {
  source: SourceConfig
  client: EndpointClient
  tracker: SequenceTracker
  store: SampleStore
  logger?: Logger
  /** Ceiling of the transport backoff, in poll intervals */
  backoffMaxIntervals?: number
  backoffJitter?: number
  /** Store a sample even when its sequence equals the previous one */
  recordUnchangedSequence?: boolean
}

/**
 * Polls one source on a fixed cadence. Each tick fetches a snapshot, classifies
 * its sequence number and appends it to the store. Transport failures back off
 * exponentially and are retried until the poller is stopped.
 */
export class Poller {
  readonly source: SourceConfig
  readonly client: EndpointClient
  readonly tracker: SequenceTracker
  readonly store: SampleStore
  readonly logger: Logger
  readonly recordUnchangedSequence: boolean

  readonly onSample = new Event<[sample: Sample, report: GapReport]>()
  readonly onUnchanged = new Event<[sequence: number]>()
  readonly onFailure = new Event<[failure: PollFailure]>()
  readonly onStopped = new Event<[]>()

  state: PollerState = 'idle'
  consecutiveFailures = 0
  totalFailures = 0
  samplesPersisted = 0
  lastSuccessTime: Date | null = null
  lastError: Error | null = null

  private readonly backoff: Backoff
  private running: Promise<void> | null = null
  private stopRequested = false
  private eventLoopTimeout: SetTimeoutToken | null = null
  private wake: (() => void) | null = null
  private abortController: AbortController | null = null

  constructor(options: PollerOptions) {
    const logger = options.logger || createRootLogger()

    this.source = options.source
    this.client = options.client
    this.tracker = options.tracker
    this.store = options.store
    this.logger = logger.withTag('poller').withTag(options.source.sourceId)
    this.recordUnchangedSequence = options.recordUnchangedSequence ?? false

    const interval = options.source.pollIntervalMs
    this.backoff = new Backoff({
      delay: interval,
      maxDelay: interval * (options.backoffMaxIntervals ?? DEFAULT_BACKOFF_MAX_INTERVALS),
      jitter: options.backoffJitter ?? 0,
    })
  }

  get sourceId(): string {
    return this.source.sourceId
  }

  get backoffAttempts(): number {
    return this.backoff.attempts
  }

  start(): void {
    if (this.state !== 'idle') {
      return
    }

    this.state = 'polling'
    this.logger.debug(
      `Polling ${this.source.endpointAddress} every ${this.source.pollIntervalMs}ms`,
    )
    this.running = this.eventLoop()
  }

  /**
   * Cancels the next tick and any fetch in flight. An append that already
   * started is allowed to finish. Resolves once the loop has halted.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return
    }

    if (this.state === 'idle') {
      this.state = 'stopped'
      this.onStopped.emit()
      return
    }

    this.stopRequested = true
    this.state = 'stopping'
    this.abortController?.abort()
    this.wake?.()

    await this.running
  }

  private async eventLoop(): Promise<void> {
    const interval = this.source.pollIntervalMs
    let nextTick = performance.now()

    while (!this.stopRequested) {
      let retryInMs: number | null = null

      try {
        const outcome = await this.tick()
        if (outcome.type === 'transport-failure') {
          retryInMs = outcome.retryInMs
        }
      } catch (e: unknown) {
        // Unexpected errors back off like transport failures
        retryInMs = this.backoff.next()
        this.consecutiveFailures++
        this.totalFailures++
        this.lastError = e instanceof Error ? e : new Error(ErrorUtils.renderError(e))
        this.logger.error(`Unexpected error while polling: ${ErrorUtils.renderError(e, true)}`)
      }

      if (this.stopRequested) {
        break
      }

      let delay: number

      if (retryInMs !== null) {
        this.state = 'backoff'
        delay = retryInMs
        nextTick = performance.now() + delay
      } else {
        this.state = 'polling'
        nextTick += interval
        const now = performance.now()

        // Fell behind, start the cadence over instead of firing a burst
        if (nextTick < now) {
          nextTick = now
        }
        delay = nextTick - now
      }

      await this.sleep(delay)
    }

    this.state = 'stopped'
    this.logger.debug('Stopped')
    this.onStopped.emit()
  }

  /**
   * Runs one poll: fetch, classify, then store
   */
  async tick(): Promise<TickOutcome> {
    const fetched = await this.fetchSnapshot()

    if (this.stopRequested) {
      return { type: 'stopped' }
    }

    if (fetched instanceof TransportError) {
      return this.failTransport(fetched)
    }

    let sample: Sample
    try {
      sample = this.toSample(fetched)
    } catch (e: unknown) {
      if (e instanceof InvalidSampleError) {
        const error = new TransportError('malformed', this.source.endpointAddress, e.message, {
          error: e,
        })
        return this.failTransport(error)
      }
      throw e
    }

    this.lastSuccessTime = new Date()
    this.backoff.reset()

    const last = this.tracker.state(this.sourceId).lastSequence
    if (!this.recordUnchangedSequence && last === sample.sequence) {
      this.consecutiveFailures = 0
      this.onUnchanged.emit(sample.sequence)
      return { type: 'unchanged', sequence: sample.sequence }
    }

    const report = this.tracker.observe(this.sourceId, sample.sequence)
    this.logReport(report)

    try {
      await this.store.append(this.sourceId, sample)
    } catch (e: unknown) {
      if (e instanceof StorageError) {
        return this.failStorage(e)
      }
      throw e
    }

    this.consecutiveFailures = 0
    this.samplesPersisted++
    this.onSample.emit(sample, report)
    return { type: 'success', sample, report }
  }

  private toSample(snapshot: EndpointSnapshot): Sample {
    return createSample({
      sequence: snapshot.sequence,
      timestamp: snapshot.timestamp ?? TimestampUtils.format(TimestampUtils.now()),
      sourceId: this.sourceId,
      values: snapshot.values,
      observedFields: this.source.observedFields,
    })
  }

  /**
   * Fetches with a deadline of one poll interval. The request is aborted when
   * the deadline passes even if the client ignores its own timeout.
   */
  private async fetchSnapshot(): Promise<EndpointSnapshot | TransportError> {
    const address = this.source.endpointAddress
    const timeoutMs = this.source.pollIntervalMs
    const controller = new AbortController()
    this.abortController = controller

    const [deadline, expire] = PromiseUtils.split<TransportError>()
    const timer = setTimeout(() => {
      controller.abort()
      expire(new TransportError('timeout', address, `No response within ${timeoutMs}ms`))
    }, timeoutMs)

    const request = this.client
      .fetch(address, { timeoutMs, signal: controller.signal })
      .catch((e: unknown) =>
        e instanceof TransportError
          ? e
          : new TransportError('connection', address, ErrorUtils.renderError(e), { error: e }),
      )

    try {
      return await Promise.race([request, deadline])
    } finally {
      clearTimeout(timer)
      this.abortController = null
    }
  }

  private failTransport(error: TransportError): TickOutcome {
    const retryInMs = this.backoff.next()
    this.recordFailure(error)

    const message = `${error.message}, retrying in ${retryInMs}ms (attempt ${this.consecutiveFailures})`
    // Only the first failure of a streak is a warning
    if (this.consecutiveFailures === 1) {
      this.logger.warn(message)
    } else {
      this.logger.debug(message)
    }

    this.onFailure.emit({
      kind: 'transport',
      error,
      consecutiveFailures: this.consecutiveFailures,
      retryInMs,
    })

    return { type: 'transport-failure', error, retryInMs }
  }

  private failStorage(error: StorageError): TickOutcome {
    this.recordFailure(error)
    this.logger.error(error.message)

    this.onFailure.emit({
      kind: 'storage',
      error,
      consecutiveFailures: this.consecutiveFailures,
      retryInMs: this.source.pollIntervalMs,
    })

    return { type: 'storage-failure', error }
  }

  private recordFailure(error: TransportError | StorageError): void {
    this.consecutiveFailures++
    this.totalFailures++
    this.lastError = error
  }

  private logReport(report: GapReport): void {
    switch (report.kind) {
      case 'gap':
        this.logger.warn(
          `Missed ${report.gapSize} samples between ${String(report.previous)} and ${report.current}`,
        )
        break
      case 'reset':
        this.logger.warn(
          `Sequence reset from ${String(report.previous)} to ${report.current}`,
        )
        break
      case 'out-of-order':
      case 'duplicate':
        this.logger.debug(
          `Sequence went back from ${String(report.previous)} to ${report.current} (${report.kind})`,
        )
        break
    }
  }

  private sleep(ms: number): Promise<void> {
    const [promise, resolve] = PromiseUtils.split<void>()

    const wake = () => {
      if (this.eventLoopTimeout) {
        clearTimeout(this.eventLoopTimeout)
      }
      this.eventLoopTimeout = null
      this.wake = null
      resolve()
    }

    this.wake = wake
    this.eventLoopTimeout = setTimeout(wake, ms)
    return promise
  }
}
