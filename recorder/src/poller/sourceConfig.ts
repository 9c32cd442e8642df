/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { DEFAULT_POLL_INTERVAL_MS, SourceConfigOptions } from '../fileStores'

/**
 * A source as a Poller runs it, with every default applied. Fixed for the
 * lifetime of the process.
 */
export type SourceConfig = Readonly<{
  sourceId: string
  endpointAddress: string
  pollIntervalMs: number
  observedFields: ReadonlyArray<string>
}>

export function toSourceConfig(
  options: SourceConfigOptions,
  defaultPollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
): SourceConfig {
  return Object.freeze({
    sourceId: options.sourceId,
    endpointAddress: options.endpointAddress,
    pollIntervalMs: options.pollIntervalMs ?? defaultPollIntervalMs,
    observedFields: Object.freeze([...(options.observedFields ?? [])]),
  })
}
