/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * How an observed sequence number relates to the previous one for a source.
 *
 * `duplicate`, `out-of-order` and `reset` are all backwards steps and are
 * reported with `isReset` set. They never count as missing samples.
 */
export type GapKind = 'first' | 'contiguous' | 'gap' | 'duplicate' | 'out-of-order' | 'reset'

export type GapReport = Readonly<{
  kind: GapKind
  /** Number of sequence numbers skipped between previous and current */
  gapSize: number
  isReset: boolean
  previous: number | null
  current: number
}>

export type SequenceState = {
  lastSequence: number | null
  missingCount: number
  totalObserved: number
  gapCount: number
  resetCount: number
}

export type SequenceTrackerOptions = {
  /**
   * A backwards step of at most this many sequence numbers is classified as
   * out of order instead of a counter reset
   */
  reorderWindow?: number
}

const emptyState = (): SequenceState => ({
  lastSequence: null,
  missingCount: 0,
  totalObserved: 0,
  gapCount: 0,
  resetCount: 0,
})

/**
 * Tracks the last sequence number of each source and accumulates how many
 * sequence numbers went missing between observations. Performs no I/O so the
 * same arithmetic serves live polling and offline analysis.
 */
export class SequenceTracker {
  readonly reorderWindow: number
  private readonly states = new Map<string, SequenceState>()

  constructor(options: SequenceTrackerOptions = {}) {
    this.reorderWindow = options.reorderWindow ?? 0
  }

  /**
   * Must be called exactly once per received sample, in arrival order
   */
  observe(sourceId: string, sequence: number): GapReport {
    let state = this.states.get(sourceId)
    if (!state) {
      state = emptyState()
      this.states.set(sourceId, state)
    }

    const report = this.classify(state.lastSequence, sequence)

    if (report.kind === 'gap') {
      state.missingCount += report.gapSize
      state.gapCount++
    } else if (report.isReset) {
      state.resetCount++
    }

    state.lastSequence = sequence
    state.totalObserved++
    return report
  }

  /**
   * A copy of the state of a source. Unknown sources have an empty state.
   */
  state(sourceId: string): SequenceState {
    return { ...(this.states.get(sourceId) ?? emptyState()) }
  }

  /**
   * Seeds a source with previously persisted state so that a restarted
   * process measures the gap across the restart
   */
  restore(sourceId: string, state: Partial<SequenceState>): void {
    this.states.set(sourceId, { ...emptyState(), ...state })
  }

  sources(): string[] {
    return Array.from(this.states.keys())
  }

  private classify(previous: number | null, current: number): GapReport {
    if (previous === null) {
      return { kind: 'first', gapSize: 0, isReset: false, previous, current }
    }

    const delta = current - previous

    if (delta === 1) {
      return { kind: 'contiguous', gapSize: 0, isReset: false, previous, current }
    }

    if (delta > 1) {
      return { kind: 'gap', gapSize: delta - 1, isReset: false, previous, current }
    }

    let kind: GapKind = 'reset'
    if (delta === 0) {
      kind = 'duplicate'
    } else if (-delta <= this.reorderWindow) {
      kind = 'out-of-order'
    }

    return { kind, gapSize: 0, isReset: true, previous, current }
  }
}
