/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { EndpointClient } from '../endpoint'
import { ConfigError } from '../errors'
import { SequenceStateStore } from '../fileStores'
import { createRootLogger, Logger } from '../logger'
import { isValidSourceId } from '../primitives'
import { Poller, PollerState, SourceConfig } from '../poller'
import { SequenceTracker } from '../sequence'
import { SampleStore } from '../storage'
import { ErrorUtils, SetIntervalToken, TimeUtils } from '../utils'

export type SupervisorState = 'idle' | 'running' | 'stopping' | 'stopped'

export type SourceStatus = {
  state: PollerState
  lastSuccessTime: Date | null
  consecutiveFailures: number
  totalFailures: number
  totalGaps: number
  missingSequences: number
  resets: number
  samplesPersisted: number
  lastSequence: number | null
  lastError: string | null
}

export type SupervisorOptions = {
  client: EndpointClient
  store: SampleStore
  logger?: Logger
  /** Restored from at start and written to periodically and at stop */
  stateStore?: SequenceStateStore
  stateFlushIntervalMs?: number
  reorderWindow?: number
  backoffMaxIntervals?: number
  backoffJitter?: number
  recordUnchangedSequence?: boolean
}

/**
 * Runs one Poller per source. A source that keeps failing never affects the
 * others.
 */
export class Supervisor {
  readonly client: EndpointClient
  readonly store: SampleStore
  readonly logger: Logger
  readonly tracker: SequenceTracker
  readonly stateStore: SequenceStateStore | null

  state: SupervisorState = 'idle'

  private readonly options: SupervisorOptions
  private readonly rootLogger: Logger
  private readonly pollers = new Map<string, Poller>()
  private flushInterval: SetIntervalToken | null = null
  private stopping: Promise<void> | null = null

  constructor(options: SupervisorOptions) {
    const logger = options.logger || createRootLogger()

    this.options = options
    this.rootLogger = logger
    this.client = options.client
    this.store = options.store
    this.logger = logger.withTag('supervisor')
    this.stateStore = options.stateStore ?? null
    this.tracker = new SequenceTracker({ reorderWindow: options.reorderWindow })
  }

  get sourceIds(): string[] {
    return Array.from(this.pollers.keys())
  }

  getPoller(sourceId: string): Poller | undefined {
    return this.pollers.get(sourceId)
  }

  /**
   * Validates every source before any poller starts, then starts one poller
   * per source
   *
   * @throws ConfigError if a source id is invalid or used twice
   */
  start(sources: ReadonlyArray<SourceConfig>): void {
    if (this.state !== 'idle') {
      throw new ConfigError(`Cannot start a supervisor that is ${this.state}`)
    }

    Supervisor.validate(sources)

    if (this.stateStore) {
      const restored = this.stateStore.restoreInto(
        this.tracker,
        sources.map((s) => s.sourceId),
      )

      for (const sourceId of restored) {
        const lastSequence = this.tracker.state(sourceId).lastSequence
        this.logger.info(`Resuming ${sourceId} after sequence ${String(lastSequence)}`)
      }
    }

    for (const source of sources) {
      const poller = new Poller({
        source,
        client: this.client,
        tracker: this.tracker,
        store: this.store,
        logger: this.rootLogger,
        backoffMaxIntervals: this.options.backoffMaxIntervals,
        backoffJitter: this.options.backoffJitter,
        recordUnchangedSequence: this.options.recordUnchangedSequence,
      })

      this.pollers.set(source.sourceId, poller)
    }

    this.state = 'running'

    for (const poller of this.pollers.values()) {
      poller.start()
    }

    if (this.stateStore && this.options.stateFlushIntervalMs) {
      this.flushInterval = setInterval(
        () => void this.flushState(),
        this.options.stateFlushIntervalMs,
      )
    }

    this.logger.info(`Recording ${sources.length} sources: ${this.sourceIds.join(', ')}`)
  }

  /**
   * Stops every poller and waits until all of them have halted
   */
  async stop(): Promise<void> {
    if (this.state === 'idle' || this.state === 'stopped') {
      this.state = 'stopped'
      return
    }

    if (this.stopping) {
      await this.stopping
      return
    }

    this.state = 'stopping'
    this.stopping = this.shutdown()
    await this.stopping
  }

  status(): Map<string, SourceStatus> {
    const result = new Map<string, SourceStatus>()

    for (const [sourceId, poller] of this.pollers) {
      const sequence = this.tracker.state(sourceId)

      result.set(sourceId, {
        state: poller.state,
        lastSuccessTime: poller.lastSuccessTime,
        consecutiveFailures: poller.consecutiveFailures,
        totalFailures: poller.totalFailures,
        totalGaps: sequence.gapCount,
        missingSequences: sequence.missingCount,
        resets: sequence.resetCount,
        samplesPersisted: poller.samplesPersisted,
        lastSequence: sequence.lastSequence,
        lastError: poller.lastError ? ErrorUtils.renderError(poller.lastError) : null,
      })
    }

    return result
  }

  /**
   * Writes the tracker to the state store. Failures are logged, the next
   * flush tries again.
   */
  async flushState(): Promise<void> {
    if (!this.stateStore) {
      return
    }

    try {
      await this.stateStore.saveFrom(this.tracker)
    } catch (e: unknown) {
      this.logger.error(`Could not save sequence state: ${ErrorUtils.renderError(e)}`)
    }
  }

  static validate(sources: ReadonlyArray<SourceConfig>): void {
    const seen = new Set<string>()

    for (const source of sources) {
      if (!isValidSourceId(source.sourceId)) {
        throw new ConfigError(`Invalid source id '${source.sourceId}'`)
      }

      if (seen.has(source.sourceId)) {
        throw new ConfigError(`Source '${source.sourceId}' is configured more than once`)
      }

      if (source.endpointAddress.trim().length === 0) {
        throw new ConfigError(`Source '${source.sourceId}' has no endpoint address`)
      }

      if (!Number.isInteger(source.pollIntervalMs) || source.pollIntervalMs <= 0) {
        throw new ConfigError(
          `Source '${source.sourceId}' has an invalid poll interval ${source.pollIntervalMs}`,
        )
      }

      seen.add(source.sourceId)
    }
  }

  private async shutdown(): Promise<void> {
    const start = performance.now()

    if (this.flushInterval) {
      clearInterval(this.flushInterval)
      this.flushInterval = null
    }

    await Promise.all(Array.from(this.pollers.values()).map((poller) => poller.stop()))
    await this.flushState()

    this.state = 'stopped'
    this.logger.info(`Stopped all pollers in ${TimeUtils.renderSpan(performance.now() - start)}`)
  }
}
