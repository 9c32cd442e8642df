/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Parses an ISO-8601 timestamp into microseconds since the epoch. Fractions
 * past the sixth digit are truncated and a missing zone means UTC.
 */
function parse(value: string): number {
  const match = ISO_PATTERN.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid timestamp: ${value}`)
  }

  const [, date, time, fraction, zone] = match

  let offset = 'Z'
  if (zone && zone.toUpperCase() !== 'Z') {
    offset = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`
  }

  // Date.parse rolls 2025-02-30 over into March
  const wall = Date.parse(`${date}T${time}Z`)
  if (Number.isNaN(wall) || new Date(wall).toISOString().slice(0, 19) !== `${date}T${time}`) {
    throw new Error(`Invalid timestamp: ${value}`)
  }

  const seconds = Date.parse(`${date}T${time}${offset}`)
  if (Number.isNaN(seconds)) {
    throw new Error(`Invalid timestamp: ${value}`)
  }

  const micros = Number((fraction ?? '').padEnd(6, '0').slice(0, 6))
  return seconds * 1000 + micros
}

/**
 * Formats epoch microseconds as `yyyy-MM-ddTHH:mm:ss.ffffffZ`
 */
function format(micros: number): string {
  const millis = Math.floor(micros / 1000)
  const remainder = micros - millis * 1000
  const iso = new Date(millis).toISOString()
  return `${iso.slice(0, 23)}${String(remainder).padStart(3, '0')}Z`
}

function normalize(value: string): string {
  return format(parse(value))
}

function isValid(value: string): boolean {
  try {
    parse(value)
    return true
  } catch {
    return false
  }
}

/**
 * Current wall clock time in microseconds since the epoch
 */
function now(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000)
}

function toDate(value: string): Date {
  return new Date(Math.floor(parse(value) / 1000))
}

export const TimestampUtils = {
  parse,
  format,
  normalize,
  isValid,
  now,
  toDate,
}
