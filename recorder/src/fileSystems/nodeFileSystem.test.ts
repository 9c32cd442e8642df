/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import os from 'os'
import path from 'path'
import { getUniqueTestDataDir } from '../testUtilities'
import { NodeFileProvider } from './nodeFileSystem'

describe('NodeFileProvider', () => {
  it('expands ~ to the home directory', async () => {
    const files = await new NodeFileProvider().init()
    expect(files.resolve('~/recorder')).toEqual(path.join(os.homedir(), 'recorder'))
    expect(files.resolve('~+/recorder')).toEqual(path.join(process.cwd(), 'recorder'))
  })

  it('appends and reads back lines', async () => {
    const files = await new NodeFileProvider().init()
    const dir = getUniqueTestDataDir()
    const file = files.join(dir, 'lines.txt')

    await files.mkdir(dir, { recursive: true })
    await files.appendFile(file, 'first\n')
    await files.appendFile(file, 'second\n')

    const lines: string[] = []
    for await (const line of files.readLines(file)) {
      lines.push(line)
    }

    expect(lines).toEqual(['first', 'second'])
    expect(await files.readFile(file)).toEqual('first\nsecond\n')
  })

  it('reads the last character of a file', async () => {
    const files = await new NodeFileProvider().init()
    const dir = getUniqueTestDataDir()
    const file = files.join(dir, 'tail.txt')

    await files.mkdir(dir, { recursive: true })
    await files.writeFile(file, '')
    expect(await files.readLastChar(file)).toBeNull()

    await files.appendFile(file, '{"sequence":1}\n{"seq')
    expect(await files.readLastChar(file)).toEqual('q')

    await files.appendFile(file, '\n')
    expect(await files.readLastChar(file)).toEqual('\n')
  })

  it('renames a file over an existing one', async () => {
    const files = await new NodeFileProvider().init()
    const dir = getUniqueTestDataDir()
    const target = files.join(dir, 'state.json')
    const staged = `${target}.tmp`

    await files.mkdir(dir, { recursive: true })
    await files.writeFile(target, 'old')
    await files.writeFile(staged, 'new')
    await files.rename(staged, target)

    expect(await files.readFile(target)).toEqual('new')
    expect(await files.exists(staged)).toBe(false)
  })

  it('lists directory entries in sorted order', async () => {
    const files = await new NodeFileProvider().init()
    const dir = getUniqueTestDataDir()

    await files.mkdir(files.join(dir, 'b'), { recursive: true })
    await files.mkdir(files.join(dir, 'a'), { recursive: true })

    expect(await files.readdir(dir)).toEqual(['a', 'b'])
  })

  it('reports whether a path exists', async () => {
    const files = await new NodeFileProvider().init()
    const dir = getUniqueTestDataDir()

    expect(await files.exists(dir)).toBe(false)
    await files.mkdir(dir, { recursive: true })
    expect(await files.exists(dir)).toBe(true)
  })
})
