/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import colors from 'colors/safe'
import { ConsolaReporter, ConsolaReporterLogObject, LogLevel, logType } from 'consola'
import { format as formatDate } from 'date-fns'

const LEVEL_COLORS: Partial<Record<logType, (text: string) => string>> = {
  fatal: colors.red,
  error: colors.red,
  warn: colors.yellow,
  success: colors.green,
  debug: colors.gray,
  verbose: colors.gray,
  trace: colors.gray,
}

/**
 * Filters entries by tag and renders the `logPrefix` template
 * (`%time%`, `%level%`, `%tag%`) in front of them
 */
export abstract class TextReporter implements ConsolaReporter {
  /** Level overrides keyed by a single tag such as `poller` */
  readonly tagToLogLevelMap: Map<string, LogLevel> = new Map<string, LogLevel>()

  defaultMinimumLogLevel: LogLevel = LogLevel.Info

  logPrefix = ''

  /** Colors `%level%` by severity */
  colorEnabled = false

  /**
   * `*` sets `defaultMinimumLogLevel`
   */
  setLogLevel(tag: string, level: LogLevel): void {
    if (tag === '*') {
      this.defaultMinimumLogLevel = level
    } else {
      this.tagToLogLevelMap.set(tag, level)
    }
  }

  /**
   * The most verbose level shown for a tag chain like `recorder:poller:VTC`.
   * The override of the innermost tag that has one wins.
   */
  levelFor(tag: string): LogLevel {
    const tags = tag.split(':')

    for (let i = tags.length - 1; i >= 0; i--) {
      const level = this.tagToLogLevelMap.get(tags[i])
      if (level !== undefined) {
        return level
      }
    }

    return this.defaultMinimumLogLevel
  }

  abstract logText(logObj: ConsolaReporterLogObject, args: unknown[]): void

  log(logObj: ConsolaReporterLogObject): void {
    if (logObj.level > this.levelFor(logObj.tag)) {
      return
    }

    const args: unknown[] = this.logPrefix
      ? [this.renderPrefix(logObj), ...logObj.args]
      : [...logObj.args]

    this.logText(logObj, args)
  }

  private renderPrefix(logObj: ConsolaReporterLogObject): string {
    const color = this.colorEnabled ? LEVEL_COLORS[logObj.type] : undefined
    const level = color ? color(logObj.type) : logObj.type

    return this.logPrefix
      .replace(/%time%/g, formatDate(logObj.date, 'HH:mm:ss.SSS'))
      .replace(/%level%/g, level)
      .replace(/%tag%/g, logObj.tag)
  }
}
