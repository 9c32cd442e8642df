/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { FileSystem } from '../fileSystems'
import { KeyStore } from './keyStore'

export const DEFAULT_CONFIG_NAME = 'config.json'
export const DEFAULT_DATA_DIR = '~/.machine-recorder'
export const DEFAULT_POLL_INTERVAL_MS = 200
export const DEFAULT_BACKOFF_MAX_INTERVALS = 60
export const DEFAULT_STATE_FLUSH_INTERVAL_MS = 5000
export const DEFAULT_SAMPLING_RATE_THRESHOLD_HZ = 4.9

export type TimestampSource = 'local' | 'agent'

/**
 * One machine endpoint to record. When `observedFields` is empty or missing
 * every observation the endpoint returns is recorded.
 */
export type SourceConfigOptions = {
  sourceId: string
  endpointAddress: string
  pollIntervalMs?: number
  observedFields?: string[]
}

export type ConfigOptions = {
  sources: SourceConfigOptions[]
  /**
   * Root of the partitioned sample logs, `<samplesDir>/<sourceId>/<date>.jsonl`
   */
  samplesDir: string
  /**
   * IANA time zone that decides which calendar day a sample belongs to.
   * The host time zone is never used.
   */
  timeZone: string
  /**
   * Poll interval for sources that do not set their own. 200ms is 5Hz.
   */
  pollIntervalMs: number
  /**
   * Ceiling of the transport backoff, in poll intervals
   */
  backoffMaxIntervals: number
  /**
   * Random extra delay added to each backoff, as a fraction of the delay
   */
  backoffJitter: number
  /**
   * When false, a snapshot that repeats the last sequence number is not stored
   */
  recordUnchangedSequence: boolean
  /**
   * How far a sequence may step backwards and still count as out of order
   * instead of a counter reset. 0 treats every backwards step as a reset.
   */
  reorderWindow: number
  /**
   * `local` stamps samples with the receive time, `agent` with the agent's
   * header creation time
   */
  timestampSource: TimestampSource
  includeConditions: boolean
  stateFlushIntervalMs: number
  samplingRateThresholdHz: number
  enableLogFile: boolean
  /**
   * Log levels are formatted like so:
   * `*:warn,tag:info`
   *
   * ex: `*:warn,poller:info` displays warns and errors, as well as info
   *     logs from pollers.
   */
  logLevel: string
  /**
   * String to be prefixed to all logs. Accepts the following replacements:
   * %time% : The time of the log
   * %tag% : The tags on the log
   * %level% : The log level
   *
   * ex: `[%time%] [%level%] [%tag%]`
   */
  logPrefix: string
  logColors: boolean
  jsonLogs: boolean
}

const isTimeZone = (value: string | undefined): boolean => {
  if (value === undefined) {
    return true
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

export const SourceConfigSchema: yup.ObjectSchema<SourceConfigOptions> = yup
  .object({
    sourceId: yup.string().trim().required(),
    endpointAddress: yup.string().trim().required(),
    pollIntervalMs: yup.number().integer().positive(),
    observedFields: yup.array(yup.string().trim().required()),
  })
  .defined()

export const ConfigOptionsSchema: yup.ObjectSchema<Partial<ConfigOptions>> = yup
  .object({
    sources: yup.array(SourceConfigSchema),
    samplesDir: yup.string().trim(),
    timeZone: yup
      .string()
      .trim()
      .test('time-zone', '${path} must be an IANA time zone', isTimeZone),
    pollIntervalMs: yup.number().integer().positive(),
    backoffMaxIntervals: yup.number().integer().min(1),
    backoffJitter: yup.number().min(0).max(1),
    recordUnchangedSequence: yup.boolean(),
    reorderWindow: yup.number().integer().min(0),
    timestampSource: yup.mixed<TimestampSource>().oneOf(['local', 'agent']),
    includeConditions: yup.boolean(),
    stateFlushIntervalMs: yup.number().integer().positive(),
    samplingRateThresholdHz: yup.number().min(0),
    enableLogFile: yup.boolean(),
    logLevel: yup.string(),
    logPrefix: yup.string(),
    logColors: yup.boolean(),
    jsonLogs: yup.boolean(),
  })
  .defined()

export class RecorderConfig extends KeyStore<ConfigOptions> {
  readonly logFilePath: string

  constructor(files: FileSystem, dataDir: string, configName?: string) {
    super(
      files,
      configName || DEFAULT_CONFIG_NAME,
      RecorderConfig.GetDefaults(files, dataDir),
      dataDir,
      ConfigOptionsSchema,
    )

    this.logFilePath = files.join(this.storage.dataDir, 'recorder.log')
  }

  static GetDefaults(files: FileSystem, dataDir: string): ConfigOptions {
    return {
      sources: [],
      samplesDir: files.resolve(files.join(dataDir, 'samples')),
      timeZone: 'UTC',
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      backoffMaxIntervals: DEFAULT_BACKOFF_MAX_INTERVALS,
      backoffJitter: 0,
      recordUnchangedSequence: false,
      reorderWindow: 0,
      timestampSource: 'local',
      includeConditions: false,
      stateFlushIntervalMs: DEFAULT_STATE_FLUSH_INTERVAL_MS,
      samplingRateThresholdHz: DEFAULT_SAMPLING_RATE_THRESHOLD_HZ,
      enableLogFile: false,
      logLevel: '*:info',
      logPrefix: '',
      logColors: true,
      jsonLogs: false,
    }
  }
}
