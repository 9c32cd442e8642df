/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

const UNITS: ReadonlyArray<[suffix: string, ms: number]> = [
  ['d', 24 * 60 * 60 * 1000],
  ['h', 60 * 60 * 1000],
  ['m', 60 * 1000],
  ['s', 1000],
]

/**
 * Renders a duration in milliseconds like `1h 2m 3s 4ms`
 */
const renderSpan = (time: number): string => {
  const sign = time < 0 ? '-' : ''
  let rest = Math.abs(time)

  if (rest < 1) {
    return `${sign}${Number(rest.toFixed(3))}ms`
  }

  const parts: string[] = []
  for (const [suffix, size] of UNITS) {
    if (rest >= size) {
      const count = Math.floor(rest / size)
      rest -= count * size
      parts.push(`${count}${suffix}`)
    }
  }

  const millis = Math.round(rest)
  if (millis > 0 || parts.length === 0) {
    parts.push(`${millis}ms`)
  }

  return sign + parts.join(' ')
}

export const TimeUtils = {
  renderSpan,
}
