/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import fs from 'fs'
import fsAsync from 'fs/promises'
import os from 'os'
import path from 'path'
import readline from 'readline'
import { FileSystem } from './fileSystem'

export class NodeFileProvider extends FileSystem {
  init(): Promise<NodeFileProvider> {
    return Promise.resolve(this)
  }

  async access(path: fs.PathLike, mode?: number): Promise<void> {
    await fsAsync.access(path, mode)
  }

  async writeFile(
    path: string,
    data: string,
    options?: { mode?: fs.Mode; flag?: fs.OpenMode },
  ): Promise<void> {
    await fsAsync.writeFile(path, data, options)
  }

  async appendFile(path: string, data: string): Promise<void> {
    await fsAsync.appendFile(path, data, { encoding: 'utf8' })
  }

  async readFile(path: string): Promise<string> {
    return await fsAsync.readFile(path, { encoding: 'utf8' })
  }

  async readLastChar(path: string): Promise<string | null> {
    const handle = await fsAsync.open(path, 'r')

    try {
      const { size } = await handle.stat()
      if (size === 0) {
        return null
      }

      const buffer = Buffer.alloc(1)
      await handle.read(buffer, 0, 1, size - 1)
      return buffer.toString('latin1')
    } finally {
      await handle.close()
    }
  }

  async *readLines(path: string): AsyncGenerator<string, void> {
    const stream = fs.createReadStream(path, { encoding: 'utf8' })
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity })

    try {
      for await (const line of lines) {
        yield line
      }
    } finally {
      lines.close()
      stream.destroy()
    }
  }

  async readdir(path: string): Promise<string[]> {
    const entries = await fsAsync.readdir(path)
    return entries.sort()
  }

  async mkdir(path: string, options: { recursive?: boolean }): Promise<void> {
    await fsAsync.mkdir(path, options)
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    await fsAsync.rename(oldPath, newPath)
  }

  resolve(_path: string): string {
    return path.resolve(this.expandTilde(_path))
  }

  join(...paths: string[]): string {
    return path.join(...paths)
  }

  dirname(_path: string): string {
    return path.dirname(_path)
  }

  async exists(_path: string): Promise<boolean> {
    return await this.access(_path)
      .then(() => true)
      .catch(() => false)
  }

  /**
   * Expands a path out using known unix shell shortcuts
   * ~ expands to your home directory
   * ~+ expands to your current directory
   */
  private expandTilde(filePath: string): string {
    if (!filePath.startsWith('~')) {
      return filePath
    }

    if (filePath.startsWith('~+')) {
      return path.join(process.cwd(), filePath.slice(2))
    }

    const home = os.homedir()
    if (!home) {
      return filePath
    }

    return path.join(home, filePath.slice(1))
  }
}
