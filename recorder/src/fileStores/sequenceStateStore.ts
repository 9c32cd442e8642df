/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { ConfigError } from '../errors'
import { FileSystem } from '../fileSystems'
import { createRootLogger, Logger } from '../logger'
import { SequenceState, SequenceTracker } from '../sequence'
import { KeyStore } from './keyStore'

export const DEFAULT_STATE_NAME = 'state.json'

export type PersistedSequenceState = SequenceState & { sourceId: string }

export type SequenceStateOptions = {
  sources: PersistedSequenceState[]
  savedAt: string | null
}

const count = () => yup.number().integer().min(0).defined()

export const SequenceStateSchema: yup.ObjectSchema<Partial<SequenceStateOptions>> = yup
  .object({
    sources: yup.array(
      yup
        .object({
          sourceId: yup.string().required(),
          lastSequence: yup.number().integer().min(0).nullable().defined(),
          missingCount: count(),
          totalObserved: count(),
          gapCount: count(),
          resetCount: count(),
        })
        .defined(),
    ),
    savedAt: yup.string().nullable(),
  })
  .defined()

/**
 * Persists the sequence tracker between runs so the first sample after a
 * restart is compared with the last sample before it
 */
export class SequenceStateStore extends KeyStore<SequenceStateOptions> {
  private readonly logger: Logger

  constructor(
    files: FileSystem,
    dataDir: string,
    options: { fileName?: string; logger?: Logger } = {},
  ) {
    super(
      files,
      options.fileName || DEFAULT_STATE_NAME,
      { sources: [], savedAt: null },
      dataDir,
      SequenceStateSchema,
    )
    this.logger = (options.logger ?? createRootLogger()).withTag('state')
  }

  /**
   * Loads the saved state. A file that cannot be read as state is set aside
   * with a warning and tracking starts from nothing.
   */
  override async load(): Promise<void> {
    try {
      await super.load()
    } catch (e: unknown) {
      if (!(e instanceof ConfigError)) {
        throw e
      }

      this.logger.warn(`Starting without saved sequence state: ${e.message}`)
      this.loaded = {}
    }
  }

  /**
   * Seeds the tracker with every persisted source in `sourceIds`
   *
   * @returns the ids that were restored
   */
  restoreInto(tracker: SequenceTracker, sourceIds: ReadonlyArray<string>): string[] {
    const wanted = new Set(sourceIds)
    const restored: string[] = []

    for (const { sourceId, ...state } of this.get('sources')) {
      if (wanted.has(sourceId)) {
        tracker.restore(sourceId, state)
        restored.push(sourceId)
      }
    }

    return restored
  }

  async saveFrom(tracker: SequenceTracker, savedAt: Date = new Date()): Promise<void> {
    const sources = tracker.sources().map((sourceId) => ({
      sourceId,
      ...tracker.state(sourceId),
    }))

    this.set('sources', sources)
    this.set('savedAt', savedAt.toISOString())
    await this.save()
  }
}
