/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'
import { ConfigError } from '../errors'

const LEVELS: ReadonlyMap<string, LogLevel> = new Map([
  ['fatal', LogLevel.Fatal],
  ['error', LogLevel.Error],
  ['warn', LogLevel.Warn],
  ['log', LogLevel.Log],
  ['info', LogLevel.Info],
  ['success', LogLevel.Success],
  ['debug', LogLevel.Debug],
  ['trace', LogLevel.Trace],
  ['silent', LogLevel.Silent],
  ['verbose', LogLevel.Verbose],
])

// `level` or `tag:level`
const ENTRY_PATTERN = /^(?:([^:\s]+):)?([a-z]+)$/i

/**
 * Parses the `logLevel` setting into tag and level pairs. A bare level
 * applies to the `*` tag.
 *
 * ex: `*:warn,poller:debug`
 *
 * @throws ConfigError for an entry that is not `tag:level` or an unknown level
 */
export const parseLogLevelConfig = (
  logLevelConfig: string,
): ReadonlyArray<[string, LogLevel]> => {
  return logLevelConfig.split(',').map((entry): [string, LogLevel] => {
    const match = ENTRY_PATTERN.exec(entry.trim())
    if (!match) {
      throw new ConfigError(`Log levels must have format tag:level, got '${entry.trim()}'`)
    }

    const tag = match[1] ?? '*'
    const name = match[2].toLowerCase()
    const level = LEVELS.get(name)

    if (level === undefined) {
      throw new ConfigError(
        `Log level ${name} should be one of the following: ${[...LEVELS.keys()].join(', ')}`,
      )
    }

    return [tag.toLowerCase(), level]
  })
}
