/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { FileSystem } from '../fileSystems'
import { Mutex } from '../mutex'
import { JSONUtils } from '../utils'

/**
 * A JSON document stored at `<dataDir>/<fileName>`. Loading returns the parsed
 * but unvalidated content so callers validate it against their own schema.
 */
export class FileStore<T extends Record<string, unknown>> {
  files: FileSystem
  dataDir: string
  filePath: string
  fileName: string
  saveFileMutex = new Mutex()

  constructor(files: FileSystem, fileName: string, dataDir: string) {
    this.files = files
    this.dataDir = files.resolve(dataDir)
    this.fileName = fileName
    this.filePath = files.join(this.dataDir, fileName)
  }

  async load(): Promise<unknown> {
    const exists = await this.files.exists(this.filePath)
    if (!exists) {
      return null
    }

    const data = await this.files.readFile(this.filePath)
    if (data.trim().length === 0) {
      return null
    }

    return JSONUtils.parse(data, this.fileName)
  }

  /**
   * Writes a sibling `.tmp` file and renames it over the document, so a crash
   * mid-save leaves the previous document in place
   */
  async save(data: Partial<T>): Promise<void> {
    const json = JSON.stringify(data, undefined, '  ')
    const stagedPath = `${this.filePath}.tmp`

    await this.saveFileMutex.dispatch(async () => {
      await this.files.mkdir(this.files.dirname(this.filePath), { recursive: true })
      await this.files.writeFile(stagedPath, json)
      await this.files.rename(stagedPath, this.filePath)
    })
  }
}
