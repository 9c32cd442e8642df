/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import type fs from 'fs'

export abstract class FileSystem {
  abstract init(): Promise<FileSystem>
  abstract access(path: fs.PathLike, mode?: number): Promise<void>
  abstract writeFile(
    path: string,
    data: string,
    options?: { mode?: fs.Mode; flag?: fs.OpenMode },
  ): Promise<void>
  abstract appendFile(path: string, data: string): Promise<void>
  abstract readFile(path: string): Promise<string>
  /**
   * The final character of a file, or null when the file is empty
   */
  abstract readLastChar(path: string): Promise<string | null>
  /**
   * Reads a text file line by line without loading it whole
   */
  abstract readLines(path: string): AsyncIterable<string>
  abstract readdir(path: string): Promise<string[]>
  abstract mkdir(path: string, options: { recursive?: boolean }): Promise<void>
  abstract rename(oldPath: string, newPath: string): Promise<void>
  abstract resolve(path: string): string
  abstract join(...paths: string[]): string
  abstract dirname(path: string): string
  abstract exists(path: string): Promise<boolean>
}
