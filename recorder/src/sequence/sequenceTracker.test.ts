/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { SequenceTracker } from './sequenceTracker'

describe('SequenceTracker', () => {
  it('reports the first observation without a gap', () => {
    const tracker = new SequenceTracker()

    expect(tracker.observe('VTC', 245)).toEqual({
      kind: 'first',
      gapSize: 0,
      isReset: false,
      previous: null,
      current: 245,
    })
    expect(tracker.state('VTC')).toEqual({
      lastSequence: 245,
      missingCount: 0,
      totalObserved: 1,
      gapCount: 0,
      resetCount: 0,
    })
  })

  it('keeps missingCount at zero for contiguous sequences', () => {
    const tracker = new SequenceTracker()

    for (let sequence = 1000; sequence < 1100; sequence++) {
      const report = tracker.observe('VTC', sequence)
      expect(report.gapSize).toBe(0)
      expect(report.isReset).toBe(false)
    }

    expect(tracker.state('VTC').missingCount).toBe(0)
    expect(tracker.state('VTC').totalObserved).toBe(100)
  })

  it('adds the skipped numbers and reports the gap bounds', () => {
    const tracker = new SequenceTracker()
    const pairs: Array<[number, number]> = [
      [10, 12],
      [12, 20],
      [20, 1020],
    ]

    let missing = 0
    tracker.observe('VTC', 10)

    for (const [previous, current] of pairs) {
      const report = tracker.observe('VTC', current)
      missing += current - previous - 1

      expect(report).toEqual({
        kind: 'gap',
        gapSize: current - previous - 1,
        isReset: false,
        previous,
        current,
      })
      expect(tracker.state('VTC').missingCount).toBe(missing)
    }

    expect(tracker.state('VTC').missingCount).toBe(1 + 7 + 999)
    expect(tracker.state('VTC').gapCount).toBe(3)
  })

  it('classifies backwards steps as resets without counting them missing', () => {
    const tracker = new SequenceTracker()
    tracker.observe('VTC', 500)
    tracker.observe('VTC', 502)

    const repeated = tracker.observe('VTC', 502)
    expect(repeated).toMatchObject({ kind: 'duplicate', isReset: true, gapSize: 0 })

    const restarted = tracker.observe('VTC', 3)
    expect(restarted).toEqual({
      kind: 'reset',
      gapSize: 0,
      isReset: true,
      previous: 502,
      current: 3,
    })

    expect(tracker.state('VTC')).toEqual({
      lastSequence: 3,
      missingCount: 1,
      totalObserved: 4,
      gapCount: 1,
      resetCount: 2,
    })
  })

  it('treats small backwards steps inside the reorder window as out of order', () => {
    const tracker = new SequenceTracker({ reorderWindow: 5 })
    tracker.observe('VTC', 100)

    expect(tracker.observe('VTC', 96).kind).toBe('out-of-order')
    expect(tracker.observe('VTC', 50).kind).toBe('reset')
  })

  it('continues counting from the new position after a reset', () => {
    const tracker = new SequenceTracker()
    tracker.observe('VTC', 900)
    tracker.observe('VTC', 1)

    expect(tracker.observe('VTC', 4)).toMatchObject({ kind: 'gap', gapSize: 2, previous: 1 })
  })

  it('keeps sources independent', () => {
    const tracker = new SequenceTracker()
    tracker.observe('VTC', 1)
    tracker.observe('HAAS', 100)
    tracker.observe('VTC', 5)

    expect(tracker.state('VTC').missingCount).toBe(3)
    expect(tracker.state('HAAS').missingCount).toBe(0)
    expect(tracker.sources()).toEqual(['VTC', 'HAAS'])
  })

  it('measures the gap across a restore', () => {
    const tracker = new SequenceTracker()
    tracker.restore('VTC', { lastSequence: 249, missingCount: 1, totalObserved: 4 })

    expect(tracker.observe('VTC', 260)).toMatchObject({ kind: 'gap', gapSize: 10 })
    expect(tracker.state('VTC')).toEqual({
      lastSequence: 260,
      missingCount: 11,
      totalObserved: 5,
      gapCount: 1,
      resetCount: 0,
    })
  })

  it('returns copies of the state', () => {
    const tracker = new SequenceTracker()
    tracker.observe('VTC', 1)

    const state = tracker.state('VTC')
    state.missingCount = 99
    expect(tracker.state('VTC').missingCount).toBe(0)
    expect(tracker.state('UNKNOWN').lastSequence).toBeNull()
  })
})
