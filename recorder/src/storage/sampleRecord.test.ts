/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { createSample } from '../primitives'
import { SampleRecordEncoding } from './sampleRecord'

describe('SampleRecordEncoding', () => {
  const sample = createSample({
    sequence: 245,
    timestamp: '2025-06-03T08:00:00.123456Z',
    sourceId: 'VTC',
    values: { SpindleSpeed: 1200, execution: null, mode: 'AUTOMATIC' },
  })

  it('encodes one JSON object with snake case source id', () => {
    expect(SampleRecordEncoding.encode(sample)).toEqual(
      '{"sequence":245,"timestamp":"2025-06-03T08:00:00.123456Z","source_id":"VTC",' +
        '"fields":{"SpindleSpeed":1200,"execution":null,"mode":"AUTOMATIC"}}',
    )
  })

  it('decodes what it encodes', () => {
    const { sample: decoded, error } = SampleRecordEncoding.decode(
      SampleRecordEncoding.encode(sample),
    )

    expect(error).toBeNull()
    expect(decoded).toEqual(sample)
  })

  it('decodes a sample with a zero reading to an equal sample', () => {
    const zero = createSample({
      sequence: 246,
      timestamp: '2025-06-03T08:00:00.2Z',
      sourceId: 'VTC',
      values: { Xload: -0 },
    })

    const { sample: decoded } = SampleRecordEncoding.decode(SampleRecordEncoding.encode(zero))

    expect(decoded).toEqual(zero)
  })

  it('returns an error for truncated lines', () => {
    const result = SampleRecordEncoding.decode('{"sequence":245,"timest')
    expect(result.sample).toBeNull()
    expect(result.error?.message).toContain('Parsing <unknown> Failed')
  })

  it('rejects records with the wrong shape', () => {
    const badLines = [
      '{"sequence":"245","timestamp":"2025-06-03T08:00:00Z","source_id":"VTC","fields":{}}',
      '{"sequence":-1,"timestamp":"2025-06-03T08:00:00Z","source_id":"VTC","fields":{}}',
      '{"sequence":1,"timestamp":"noon","source_id":"VTC","fields":{}}',
      '{"sequence":1,"timestamp":"2025-06-03T08:00:00Z","fields":{}}',
      '{"sequence":1,"timestamp":"2025-06-03T08:00:00Z","source_id":"VTC","fields":{"a":[1]}}',
      '[1,2,3]',
    ]

    for (const line of badLines) {
      expect(SampleRecordEncoding.decode(line).sample).toBeNull()
    }
  })
})
