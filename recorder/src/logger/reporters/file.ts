/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ConsolaReporterLogObject } from 'consola'
import fs from 'fs'
import { logObjToJSON } from './console'
import { TextReporter } from './text'

/**
 * Appends every log line to a file, used when `enableLogFile` is set
 */
export class FileReporter extends TextReporter {
  readonly path: string
  private stream: fs.WriteStream
  logToJSON = false

  constructor(path: string) {
    super()

    this.path = path
    this.colorEnabled = false
    this.stream = fs.createWriteStream(path, { flags: 'a' })
  }

  logText(logObj: ConsolaReporterLogObject, args: unknown[]): void {
    const data = this.logToJSON ? logObjToJSON(logObj) : args.map(String).join(' ')
    this.stream.write(data + '\n')
  }

  close(): Promise<void> {
    return new Promise((resolve) => this.stream.end(resolve))
  }
}
