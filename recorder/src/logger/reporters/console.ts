/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

// The reporter intentionally logs to the console, so disable the lint
/* eslint-disable no-console */

import { ConsolaReporterLogObject, logType } from 'consola'
import { TextReporter } from './text'

const silentLogger = (): void => {
  /* noop */
}

export const loggers: Record<logType, typeof console.log> = {
  fatal: console.error,
  error: console.error,
  warn: console.warn,
  log: console.log,
  info: console.info,
  success: console.info,
  debug: console.debug,
  trace: console.trace,
  verbose: console.debug,
  ready: console.info,
  start: console.info,
  silent: silentLogger,
}

export const getConsoleLogger = (type: logType): typeof console.log => {
  // unknown types log as plain log
  return type in loggers ? loggers[type] : loggers.log
}

/**
 * Serializes a log entry to one JSON line. The first object argument is
 * merged into the entry so structured fields stay queryable.
 */
export const logObjToJSON = (logObj: ConsolaReporterLogObject): string => {
  const objectArgs = logObj.args.filter(
    (a): a is Record<string, unknown> => typeof a === 'object' && a !== null,
  )
  const otherArgs = logObj.args.filter((a) => typeof a !== 'object' || a === null)

  const toLog = {
    ...objectArgs[0],
    level: logObj.level,
    tag: logObj.tag,
    date: logObj.date,
    message: otherArgs.map(String).join(' '),
  }

  return JSON.stringify(toLog)
}

export class ConsoleReporter extends TextReporter {
  logToJSON = false

  logText(logObj: ConsolaReporterLogObject, args: unknown[]): void {
    const logger = getConsoleLogger(logObj.type)
    this.logToJSON ? logger(logObjToJSON(logObj)) : logger(...args)
  }
}
