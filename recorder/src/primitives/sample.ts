/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { RecorderError } from '../errors'
import { TimestampUtils } from '../utils'

/**
 * Stored in place of an observation the endpoint did not report, or reported
 * as unavailable. Fields are never dropped.
 */
export const UNAVAILABLE = null

export type FieldValue = number | string | typeof UNAVAILABLE

export type SampleFields = Readonly<Record<string, FieldValue>>

export type Sample = Readonly<{
  sequence: number
  /** UTC with microseconds, `2025-06-03T08:00:00.000000Z` */
  timestamp: string
  sourceId: string
  fields: SampleFields
}>

export type CreateSampleParams = {
  sequence: number
  timestamp: string
  sourceId: string
  values: Readonly<Record<string, FieldValue>>
  /**
   * Names the sample must contain. When empty every value is kept.
   */
  observedFields?: ReadonlyArray<string>
}

export class InvalidSampleError extends RecorderError {}

/** JSON has no -0, so it is stored as 0 up front */
function normalizeZero(value: FieldValue): FieldValue {
  return typeof value === 'number' ? value + 0 : value
}

export function isValidSequence(sequence: number): boolean {
  return Number.isSafeInteger(sequence) && sequence >= 0
}

/**
 * Builds a frozen Sample. Each observed field missing from `values` is
 * filled with UNAVAILABLE.
 *
 * @throws InvalidSampleError if the sequence or timestamp cannot be stored
 */
export function createSample(params: CreateSampleParams): Sample {
  if (!isValidSequence(params.sequence)) {
    throw new InvalidSampleError(`Invalid sequence ${params.sequence} for ${params.sourceId}`)
  }

  if (!TimestampUtils.isValid(params.timestamp)) {
    throw new InvalidSampleError(
      `Invalid timestamp ${params.timestamp} for ${params.sourceId}`,
    )
  }

  const fields: Record<string, FieldValue> = {}
  const observed = params.observedFields ?? []

  if (observed.length > 0) {
    for (const name of observed) {
      const value = params.values[name]
      fields[name] = value === undefined ? UNAVAILABLE : normalizeZero(value)
    }
  } else {
    for (const [name, value] of Object.entries(params.values)) {
      fields[name] = normalizeZero(value)
    }
  }

  return Object.freeze({
    sequence: params.sequence,
    timestamp: TimestampUtils.normalize(params.timestamp),
    sourceId: params.sourceId,
    fields: Object.freeze(fields),
  })
}

const SOURCE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

/**
 * Source ids name a directory in the sample store, so they are limited to
 * characters that are safe in a single path segment
 */
export function isValidSourceId(sourceId: string): boolean {
  return SOURCE_ID_PATTERN.test(sourceId)
}
