/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import consola, { ConsolaReporterLogObject, LogLevel } from 'consola'
import { InterceptReporter, Logger } from '../logger'

export type TestLogger = {
  logger: Logger
  entries: ConsolaReporterLogObject[]
  /** The first argument of every captured entry of a level */
  messages: (type?: ConsolaReporterLogObject['type']) => string[]
}

/**
 * A logger that captures entries instead of printing them
 */
export function createTestLogger(): TestLogger {
  const entries: ConsolaReporterLogObject[] = []

  const logger = consola.create({
    reporters: [new InterceptReporter((logObj) => entries.push(logObj))],
    level: LogLevel.Verbose,
    throttle: 0,
  })

  const messages = (type?: ConsolaReporterLogObject['type']): string[] =>
    entries
      .filter((entry) => type === undefined || entry.type === type)
      .map((entry) => String(entry.args[0]))

  return { logger, entries, messages }
}
