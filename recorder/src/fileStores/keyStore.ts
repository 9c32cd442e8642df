/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ConfigError } from '../errors'
import { Event } from '../event'
import { FileSystem } from '../fileSystems'
import { ParseJsonError, YupSchema, YupUtils } from '../utils'
import { FileStore } from './fileStore'

/**
 * Layers values as defaults, then values loaded from the file, then overrides
 * that are never saved. Only keys that were loaded or set are written back.
 */
export class KeyStore<TSchema extends Record<string, unknown>> {
  dataDir: string
  files: FileSystem
  storage: FileStore<TSchema>
  defaults: Readonly<TSchema>
  loaded: Partial<TSchema> = {}
  overrides: Partial<TSchema> = {}
  schema: YupSchema<Partial<TSchema>>

  readonly onConfigChange: Event<[key: keyof TSchema]> = new Event()

  constructor(
    files: FileSystem,
    fileName: string,
    defaults: TSchema,
    dataDir: string,
    schema: YupSchema<Partial<TSchema>>,
  ) {
    this.files = files
    this.storage = new FileStore<TSchema>(files, fileName, dataDir)
    this.dataDir = this.storage.dataDir
    this.defaults = Object.freeze({ ...defaults })
    this.schema = schema
  }

  /**
   * @throws ConfigError if the file is not JSON or fails validation
   */
  async load(): Promise<void> {
    let data: unknown

    try {
      data = await this.storage.load()
    } catch (e: unknown) {
      if (e instanceof ParseJsonError) {
        throw new ConfigError(e.message)
      }
      throw e
    }

    if (data === null) {
      this.loaded = {}
      // Write the file out so there is something to edit
      await this.save()
      return
    }

    const { error, result } = await YupUtils.tryValidate(this.schema, data)
    if (error) {
      throw new ConfigError(`Invalid ${this.storage.fileName}: ${error.message}`)
    }

    this.loaded = { ...result }
  }

  async save(): Promise<void> {
    await this.storage.save({ ...this.loaded })
  }

  get<T extends keyof TSchema>(key: T): TSchema[T] {
    const override = this.overrides[key]
    if (override !== undefined) {
      return override
    }

    const loaded = this.loaded[key]
    if (loaded !== undefined) {
      return loaded
    }

    return this.defaults[key]
  }

  set<T extends keyof TSchema>(key: T, value: TSchema[T]): void {
    const previousValue = this.get(key)
    this.loaded[key] = value

    if (previousValue !== this.get(key)) {
      this.onConfigChange.emit(key)
    }
  }

  setMany(params: Partial<TSchema>): void {
    let key: keyof TSchema
    for (key in params) {
      const value = params[key]
      if (value !== undefined) {
        this.set(key, value)
      }
    }
  }

  setOverride<T extends keyof TSchema>(key: T, value: TSchema[T]): void {
    const previousValue = this.get(key)
    this.overrides[key] = value

    if (previousValue !== value) {
      this.onConfigChange.emit(key)
    }
  }

  clear<T extends keyof TSchema>(key: T): void {
    const previousValue = this.get(key)
    delete this.loaded[key]

    if (previousValue !== this.get(key)) {
      this.onConfigChange.emit(key)
    }
  }

  /**
   * Returns true if the key is set, or false if its value is from the defaults
   */
  isSet<T extends keyof TSchema>(key: T): boolean {
    return this.loaded[key] !== undefined || this.overrides[key] !== undefined
  }
}
