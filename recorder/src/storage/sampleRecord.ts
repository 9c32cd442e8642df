/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { createSample, FieldValue, isValidSequence, Sample } from '../primitives'
import { isRecord, JSONUtils, TimestampUtils, YupUtils } from '../utils'

/**
 * One line of a partition file
 */
export type SampleRecord = {
  sequence: number
  timestamp: string
  source_id: string
  fields: Record<string, FieldValue>
}

const isFieldValue = (value: unknown): value is FieldValue =>
  value === null ||
  typeof value === 'string' ||
  (typeof value === 'number' && Number.isFinite(value))

const isFields = (value: unknown): value is Record<string, FieldValue> =>
  isRecord(value) && Object.values(value).every(isFieldValue)

export const SampleRecordSchema: yup.ObjectSchema<SampleRecord> = yup
  .object({
    sequence: yup
      .number()
      .test('sequence', '${path} must be a safe non-negative integer', (value) =>
        value === undefined ? true : isValidSequence(value),
      )
      .required(),
    timestamp: yup
      .string()
      .test('timestamp', '${path} must be an ISO-8601 timestamp', (value) =>
        value === undefined ? true : TimestampUtils.isValid(value),
      )
      .required(),
    source_id: yup.string().required(),
    fields: yup
      .mixed<Record<string, FieldValue>>()
      .test('fields', '${path} must map names to numbers, strings or null', isFields)
      .required(),
  })
  .defined()

function encode(sample: Sample): string {
  const record: SampleRecord = {
    sequence: sample.sequence,
    timestamp: sample.timestamp,
    source_id: sample.sourceId,
    fields: { ...sample.fields },
  }

  return JSON.stringify(record)
}

/**
 * Parses one partition line. Returns an error instead of throwing so that a
 * reader can skip a damaged line and keep going.
 */
function decode(
  line: string,
): { sample: Sample; error: null } | { sample: null; error: Error } {
  const [parsed, parseError] = JSONUtils.tryParse(line)
  if (parseError) {
    return { sample: null, error: parseError }
  }

  const validated = YupUtils.tryValidateSync(SampleRecordSchema, parsed, { strict: true })
  if (validated.error !== null) {
    return { sample: null, error: validated.error }
  }

  const record = validated.result
  const sample = createSample({
    sequence: record.sequence,
    timestamp: record.timestamp,
    sourceId: record.source_id,
    values: record.fields,
  })

  return { sample, error: null }
}

export const SampleRecordEncoding = { encode, decode }
