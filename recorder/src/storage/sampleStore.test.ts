/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { StorageError } from '../errors'
import { NodeFileProvider } from '../fileSystems'
import { createSample, Sample } from '../primitives'
import { createTestLogger, getUniqueTestDataDir } from '../testUtilities'
import { SampleStore } from './sampleStore'

async function collect(samples: AsyncIterable<Sample>): Promise<Sample[]> {
  const result: Sample[] = []
  for await (const sample of samples) {
    result.push(sample)
  }
  return result
}

function makeSample(sequence: number, timestamp: string, sourceId = 'VTC'): Sample {
  return createSample({
    sequence,
    timestamp,
    sourceId,
    values: { SpindleSpeed: sequence * 10, execution: null },
  })
}

describe('SampleStore', () => {
  const setup = async (timeZone?: string) => {
    const files = await new NodeFileProvider().init()
    const directory = getUniqueTestDataDir()
    const { logger, messages } = createTestLogger()
    const store = new SampleStore({ files, logger, directory, timeZone })
    return { files, directory, store, messages }
  }

  it('round trips samples including unavailable fields', async () => {
    const { store } = await setup()
    const samples = [
      makeSample(245, '2025-06-03T08:00:00.000001Z'),
      makeSample(246, '2025-06-03T08:00:00.200002Z'),
    ]

    for (const sample of samples) {
      await store.append('VTC', sample)
    }

    expect(await collect(store.readPartition('VTC', '2025-06-03'))).toEqual(samples)
  })

  it('writes one JSON line per sample under source and date', async () => {
    const { files, directory, store } = await setup()
    await store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z'))

    const content = await files.readFile(files.join(directory, 'VTC', '2025-06-03.jsonl'))
    expect(content).toEqual(
      '{"sequence":1,"timestamp":"2025-06-03T08:00:00.000000Z","source_id":"VTC",' +
        '"fields":{"SpindleSpeed":10,"execution":null}}\n',
    )
  })

  it('partitions by the configured time zone', async () => {
    const utc = await setup()
    const berlin = await setup('Europe/Berlin')

    // 23:30 UTC is 01:30 the next day in Berlin summer time
    expect(utc.store.partitionDate('2025-06-03T23:30:00Z')).toEqual('2025-06-03')
    expect(berlin.store.partitionDate('2025-06-03T23:30:00Z')).toEqual('2025-06-04')
  })

  it('starts a new partition when the day rolls over', async () => {
    const { store } = await setup()
    await store.append('VTC', makeSample(10, '2025-06-03T23:59:59.800000Z'))
    await store.append('VTC', makeSample(11, '2025-06-04T00:00:00.000000Z'))
    // late arrival for the previous day
    await store.append('VTC', makeSample(9, '2025-06-03T23:59:59.600000Z'))

    const june3 = await collect(store.readPartition('VTC', '2025-06-03'))
    const june4 = await collect(store.readPartition('VTC', '2025-06-04'))

    expect(june3.map((s) => s.sequence)).toEqual([10, 9])
    expect(june4.map((s) => s.sequence)).toEqual([11])
    expect(await store.listDates('VTC')).toEqual(['2025-06-03', '2025-06-04'])
  })

  it('returns nothing for a missing partition', async () => {
    const { store } = await setup()
    expect(await collect(store.readPartition('VTC', '2025-06-03'))).toEqual([])
    expect(await store.listSources()).toEqual([])
    expect(await store.listDates('VTC')).toEqual([])
  })

  it('can iterate a partition more than once', async () => {
    const { store } = await setup()
    await store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z'))

    const partition = store.readPartition('VTC', '2025-06-03')
    expect(await collect(partition)).toHaveLength(1)

    await store.append('VTC', makeSample(2, '2025-06-03T08:00:01Z'))
    expect(await collect(partition)).toHaveLength(2)
  })

  it('skips damaged lines with a warning', async () => {
    const { files, directory, store, messages } = await setup()
    await store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z'))
    await files.appendFile(files.join(directory, 'VTC', '2025-06-03.jsonl'), '{"sequence":2,"ti\n')
    await store.append('VTC', makeSample(3, '2025-06-03T08:00:01Z'))

    const samples = await collect(store.readPartition('VTC', '2025-06-03'))

    expect(samples.map((s) => s.sequence)).toEqual([1, 3])
    expect(messages('warn')).toHaveLength(1)
    expect(messages('warn')[0]).toContain('Skipping line 2 of')
  })

  it('closes a torn last line before appending after a restart', async () => {
    const { files, directory, store } = await setup()
    const path = files.join(directory, 'VTC', '2025-06-03.jsonl')
    await store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z'))
    await files.appendFile(path, '{"sequence":2,"ti')

    const { logger, messages } = createTestLogger()
    const restarted = new SampleStore({ files, logger, directory })
    await restarted.append('VTC', makeSample(3, '2025-06-03T08:00:01Z'))
    await restarted.append('VTC', makeSample(4, '2025-06-03T08:00:02Z'))

    const samples = await collect(restarted.readPartition('VTC', '2025-06-03'))

    expect(samples.map((s) => s.sequence)).toEqual([1, 3, 4])
    expect(messages('warn')).toEqual([
      `Terminating a partial last line in ${path}`,
      expect.stringContaining(`Skipping line 2 of ${path}`),
    ])
  })

  it('keeps the order of concurrent appends to one partition', async () => {
    const { store } = await setup()
    const samples = Array.from({ length: 50 }, (_, i) =>
      makeSample(i, `2025-06-03T08:00:${String(i).padStart(2, '0')}Z`),
    )

    await Promise.all(samples.map((sample) => store.append('VTC', sample)))

    const stored = await collect(store.readPartition('VTC', '2025-06-03'))
    expect(stored.map((s) => s.sequence)).toEqual(samples.map((s) => s.sequence))
    expect(store['partitionLocks'].size).toBe(0)
  })

  it('writes different sources independently', async () => {
    const { store } = await setup()

    await Promise.all([
      store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z', 'VTC')),
      store.append('HAAS', makeSample(7, '2025-06-03T08:00:00Z', 'HAAS')),
    ])

    expect(await store.listSources()).toEqual(['HAAS', 'VTC'])
  })

  it('rejects a sample appended to another source', async () => {
    const { store } = await setup()
    const sample = makeSample(1, '2025-06-03T08:00:00Z', 'HAAS')

    await expect(store.append('VTC', sample)).rejects.toThrow(StorageError)
  })

  it('wraps write failures in a StorageError', async () => {
    const { files, store } = await setup()
    jest.spyOn(files, 'appendFile').mockRejectedValueOnce(new Error('ENOSPC: no space left'))

    const result = store.append('VTC', makeSample(1, '2025-06-03T08:00:00Z'))

    await expect(result).rejects.toBeInstanceOf(StorageError)
    await expect(result).rejects.toThrow('ENOSPC: no space left')
  })

  it('rejects source ids that are not a single path segment', () => {
    const store = new SampleStore({
      files: new NodeFileProvider(),
      logger: createTestLogger().logger,
      directory: getUniqueTestDataDir(),
    })

    expect(() => store.readPartition('../etc', '2025-06-03')).toThrow(StorageError)
    expect(() => store.readPartition('VTC', '03.06.2025')).toThrow('Invalid partition date')
  })
})
