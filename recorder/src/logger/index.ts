/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import consola, { Consola, LogLevel } from 'consola'
import { parseLogLevelConfig } from './logLevelParser'
import { ConsoleReporter } from './reporters/console'
export * from './logLevelParser'
export * from './reporters'

export type Logger = Consola

export const ConsoleReporterInstance = new ConsoleReporter()

/**
 * Updates the reporter's log levels from a config string.
 *
 * Format is like so: `*:warn,poller:info`
 * @param logLevelConfig A log level string formatted for use in config files or env vars
 */
export const setLogLevelFromConfig = (logLevelConfig: string): void => {
  const parsedConfig = parseLogLevelConfig(logLevelConfig)

  for (const [tag, level] of parsedConfig) {
    ConsoleReporterInstance.setLogLevel(tag, level)
  }
}

/**
 * Updates the reporter's log prefix from a config string.
 *
 * Format is like so: `[%time%] [%level%] [%tag%]`
 */
export const setLogPrefixFromConfig = (logPrefix: string): void => {
  ConsoleReporterInstance.logPrefix = logPrefix
}

export const setLogColorEnabledFromConfig = (enabled: boolean): void => {
  ConsoleReporterInstance.colorEnabled = enabled
}

export const setJSONLoggingFromConfig = (enabled: boolean): void => {
  ConsoleReporterInstance.logToJSON = enabled
}

/**
 * Creates a logger instance with the desired default settings.
 */
export const createRootLogger = (): Logger => {
  return consola.create({
    reporters: [ConsoleReporterInstance],
    // Filtering happens per tag in the reporter, so let everything through here
    level: LogLevel.Verbose,
  })
}
