/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { DEFAULT_SAMPLING_RATE_THRESHOLD_HZ } from '../fileStores'
import { createRootLogger, Logger } from '../logger'
import { SequenceTracker } from '../sequence'
import { SampleStore } from '../storage'
import { MathUtils, TimestampUtils } from '../utils'

const MICROS_PER_SECOND = 1_000_000

export const DEFAULT_TARGET_RATE_HZ = 5

export type IntegrityGap = Readonly<{
  /** Last sequence seen before the gap */
  from: number
  /** First sequence seen after the gap */
  to: number
  size: number
}>

export type IntegrityReport = Readonly<{
  sourceId: string
  date: string
  expectedSamples: number
  observedSamples: number
  missingSequences: number
  gaps: ReadonlyArray<IntegrityGap>
  resets: number
  effectiveRateHz: number
  firstTimestamp: string | null
  lastTimestamp: string | null
}>

export type SamplingRateReport = Readonly<{
  sourceId: string
  date: string
  samples: number
  /** Mean of 1/Δt over successive samples, Δt ≤ 0 skipped */
  meanRateHz: number
  effectiveRateHz: number
  targetRateHz: number
  thresholdHz: number
  belowThreshold: boolean
}>

export type SourceDaySummary = Readonly<{
  sourceId: string
  observedSamples: number
  missingSequences: number
}>

export type DailySummary = Readonly<{
  date: string
  activeSources: number
  sources: ReadonlyArray<SourceDaySummary>
}>

/** Inclusive range of partition dates, `yyyy-MM-dd` */
export type DateRange = Readonly<{ from: string; to: string }>

export type IntegrityAnalyzerOptions = {
  store: SampleStore
  logger?: Logger
  reorderWindow?: number
  /** Target rate of sources that `sourceTargetRateHz` has none for */
  targetRateHz?: number
  sourceTargetRateHz?: (sourceId: string) => number | undefined
  thresholdHz?: number
}

type PartitionScan = {
  observed: number
  missing: number
  resets: number
  gaps: IntegrityGap[]
  timestamps: number[]
  earliest: number | null
  latest: number | null
}

/**
 * Reads partitions back from a SampleStore and recomputes loss and rate
 * statistics. Every report is a function of the partition content only.
 */
export class IntegrityAnalyzer {
  readonly store: SampleStore
  readonly targetRateHz: number
  readonly thresholdHz: number
  private readonly sourceTargetRateHz: (sourceId: string) => number | undefined
  private readonly reorderWindow: number | undefined
  private readonly logger: Logger

  constructor(options: IntegrityAnalyzerOptions) {
    this.store = options.store
    this.reorderWindow = options.reorderWindow
    this.targetRateHz = options.targetRateHz ?? DEFAULT_TARGET_RATE_HZ
    this.sourceTargetRateHz = options.sourceTargetRateHz ?? (() => undefined)
    this.thresholdHz = options.thresholdHz ?? DEFAULT_SAMPLING_RATE_THRESHOLD_HZ
    this.logger = (options.logger ?? createRootLogger()).withTag('analyzer')
  }

  async analyze(sourceId: string, date: string): Promise<IntegrityReport> {
    const scan = await this.scan(sourceId, date)
    const report: IntegrityReport = {
      sourceId,
      date,
      expectedSamples: scan.observed + scan.missing,
      observedSamples: scan.observed,
      missingSequences: scan.missing,
      gaps: scan.gaps,
      resets: scan.resets,
      effectiveRateHz: effectiveRate(scan),
      firstTimestamp: scan.earliest === null ? null : TimestampUtils.format(scan.earliest),
      lastTimestamp: scan.latest === null ? null : TimestampUtils.format(scan.latest),
    }

    this.logger.debug(
      `${sourceId} ${date}: ${report.observedSamples} samples, ${report.missingSequences} missing in ${report.gaps.length} gaps`,
    )

    return report
  }

  targetRateFor(sourceId: string): number {
    return this.sourceTargetRateHz(sourceId) ?? this.targetRateHz
  }

  async samplingRate(sourceId: string, date: string): Promise<SamplingRateReport> {
    const scan = await this.scan(sourceId, date)
    const sorted = [...scan.timestamps].sort((a, b) => a - b)

    const rates: number[] = []
    for (let i = 1; i < sorted.length; i++) {
      const delta = sorted[i] - sorted[i - 1]
      if (delta > 0) {
        rates.push(MICROS_PER_SECOND / delta)
      }
    }

    const meanRateHz = MathUtils.arrayAverage(rates)

    return {
      sourceId,
      date,
      samples: scan.observed,
      meanRateHz,
      effectiveRateHz: effectiveRate(scan),
      targetRateHz: this.targetRateFor(sourceId),
      thresholdHz: this.thresholdHz,
      belowThreshold: rates.length > 0 && meanRateHz < this.thresholdHz,
    }
  }

  /**
   * Observed and missing counts per source for every stored day in the range,
   * oldest day first. A source is active on a day it has samples for.
   */
  async summarize(range: DateRange, sourceIds?: ReadonlyArray<string>): Promise<DailySummary[]> {
    const sources = sourceIds ? [...sourceIds].sort() : await this.store.listSources()
    const days = new Map<string, SourceDaySummary[]>()

    for (const sourceId of sources) {
      const dates = await this.store.listDates(sourceId)

      for (const date of dates) {
        if (date < range.from || date > range.to) {
          continue
        }

        const report = await this.analyze(sourceId, date)
        const entries = days.get(date) ?? []
        entries.push({
          sourceId,
          observedSamples: report.observedSamples,
          missingSequences: report.missingSequences,
        })
        days.set(date, entries)
      }
    }

    return Array.from(days.keys())
      .sort()
      .map((date) => {
        const entries = days.get(date) ?? []
        return {
          date,
          activeSources: entries.filter((e) => e.observedSamples > 0).length,
          sources: entries,
        }
      })
  }

  private async scan(sourceId: string, date: string): Promise<PartitionScan> {
    const tracker = new SequenceTracker({ reorderWindow: this.reorderWindow })
    const gaps: IntegrityGap[] = []
    const timestamps: number[] = []
    let earliest: number | null = null
    let latest: number | null = null

    for await (const sample of this.store.readPartition(sourceId, date)) {
      const report = tracker.observe(sourceId, sample.sequence)
      const timestamp = TimestampUtils.parse(sample.timestamp)

      timestamps.push(timestamp)
      earliest = earliest === null ? timestamp : Math.min(earliest, timestamp)
      latest = latest === null ? timestamp : Math.max(latest, timestamp)

      if (report.kind === 'gap' && report.previous !== null) {
        gaps.push({ from: report.previous, to: report.current, size: report.gapSize })
      }
    }

    const state = tracker.state(sourceId)

    return {
      observed: timestamps.length,
      missing: state.missingCount,
      resets: state.resetCount,
      gaps,
      timestamps,
      earliest,
      latest,
    }
  }
}

function effectiveRate(scan: PartitionScan): number {
  if (scan.earliest === null || scan.latest === null || scan.latest <= scan.earliest) {
    return 0
  }

  return (scan.observed * MICROS_PER_SECOND) / (scan.latest - scan.earliest)
}
