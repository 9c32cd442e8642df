/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { ConfigError } from '../errors'
import { NodeFileProvider } from '../fileSystems'
import { getUniqueTestDataDir } from '../testUtilities'
import { KeyStore } from './keyStore'

type TestOptions = { samplesDir: string; pollIntervalMs: number }

const schema: yup.ObjectSchema<Partial<TestOptions>> = yup
  .object({
    samplesDir: yup.string().trim(),
    pollIntervalMs: yup.number().integer().positive(),
  })
  .defined()

const defaults: TestOptions = { samplesDir: 'samples', pollIntervalMs: 200 }

describe('KeyStore', () => {
  it('should save and load values', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await store.load()
    expect(store.get('samplesDir')).toEqual('samples')

    store.set('samplesDir', '/var/samples')
    expect(store.get('samplesDir')).toEqual('/var/samples')
    await store.save()

    const reloaded = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await reloaded.load()
    expect(reloaded.get('samplesDir')).toEqual('/var/samples')
    expect(reloaded.isSet('samplesDir')).toBe(true)
    expect(reloaded.isSet('pollIntervalMs')).toBe(false)
  })

  it('should write the file when it does not exist', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await store.load()

    expect(await files.readFile(files.join(dir, 'store.json'))).toEqual('{}')
  })

  it('should use the schema result in load', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()
    await files.mkdir(dir, { recursive: true })
    await files.writeFile(files.join(dir, 'store.json'), '{"samplesDir": " padded "}')

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await store.load()

    expect(store.get('samplesDir')).toEqual('padded')
  })

  it('should throw a ConfigError when validation fails', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()
    await files.mkdir(dir, { recursive: true })
    await files.writeFile(files.join(dir, 'store.json'), '{"pollIntervalMs": -5}')

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    const result = store.load()

    await expect(result).rejects.toBeInstanceOf(ConfigError)
    await expect(result).rejects.toThrow('Invalid store.json')
  })

  it('should throw a ConfigError when the file is not JSON', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()
    await files.mkdir(dir, { recursive: true })
    await files.writeFile(files.join(dir, 'store.json'), '{')

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await expect(store.load()).rejects.toThrow(ConfigError)
  })

  it('should prefer overrides and not save them', async () => {
    const dir = getUniqueTestDataDir()
    const files = await new NodeFileProvider().init()

    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, dir, schema)
    await store.load()

    store.set('pollIntervalMs', 500)
    store.setOverride('pollIntervalMs', 100)
    expect(store.get('pollIntervalMs')).toEqual(100)

    await store.save()
    expect(JSON.parse(await files.readFile(files.join(dir, 'store.json')))).toEqual({
      pollIntervalMs: 500,
    })
  })

  it('should emit onConfigChange when a value changes', () => {
    const files = new NodeFileProvider()
    const store = new KeyStore<TestOptions>(files, 'store.json', defaults, 'unused', schema)
    const onChange = jest.fn()
    store.onConfigChange.on(onChange)

    store.set('pollIntervalMs', 200)
    expect(onChange).not.toHaveBeenCalled()

    store.set('pollIntervalMs', 250)
    expect(onChange).toHaveBeenCalledWith('pollIntervalMs')

    store.clear('pollIntervalMs')
    expect(store.get('pollIntervalMs')).toEqual(200)
    expect(onChange).toHaveBeenCalledTimes(2)
  })
})
