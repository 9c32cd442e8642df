/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ConsolaReporter, ConsolaReporterLogObject } from 'consola'

/**
 * Hands every entry to a callback instead of printing it. Tests use it to
 * assert on what was logged.
 */
export class InterceptReporter implements ConsolaReporter {
  private readonly onLog: (logObj: ConsolaReporterLogObject) => void

  constructor(onLog: (logObj: ConsolaReporterLogObject) => void) {
    this.onLog = onLog
  }

  log(logObj: ConsolaReporterLogObject): void {
    this.onLog(logObj)
  }
}
