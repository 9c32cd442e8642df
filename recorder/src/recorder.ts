/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { IntegrityAnalyzer } from './analyzer'
import { EndpointClient, MTConnectClient } from './endpoint'
import {
  ConfigOptions,
  DEFAULT_DATA_DIR,
  RecorderConfig,
  SequenceStateStore,
} from './fileStores'
import { FileSystem, NodeFileProvider } from './fileSystems'
import {
  createRootLogger,
  FileReporter,
  Logger,
  setJSONLoggingFromConfig,
  setLogColorEnabledFromConfig,
  setLogLevelFromConfig,
  setLogPrefixFromConfig,
} from './logger'
import { toSourceConfig } from './poller'
import { SampleStore } from './storage'
import { Supervisor } from './supervisor'

export type RecorderInitOptions = {
  dataDir?: string
  configName?: string
  configOverrides?: Partial<ConfigOptions>
  files?: FileSystem
  logger?: Logger
  /** Replaces the MTConnect client built from the config */
  client?: EndpointClient
}

/**
 * Builds the recorder from the config in a data directory: storage, the
 * endpoint client, one poller per configured source and the analyzer over
 * the same storage.
 */
export class Recorder {
  readonly config: RecorderConfig
  readonly files: FileSystem
  readonly logger: Logger
  readonly store: SampleStore
  readonly stateStore: SequenceStateStore
  readonly supervisor: Supervisor
  readonly analyzer: IntegrityAnalyzer

  private readonly rootLogger: Logger
  private readonly fileReporter: FileReporter | null

  private constructor(options: {
    config: RecorderConfig
    files: FileSystem
    logger: Logger
    store: SampleStore
    stateStore: SequenceStateStore
    supervisor: Supervisor
    analyzer: IntegrityAnalyzer
    fileReporter: FileReporter | null
  }) {
    this.config = options.config
    this.files = options.files
    this.rootLogger = options.logger
    this.logger = options.logger.withTag('recorder')
    this.store = options.store
    this.stateStore = options.stateStore
    this.supervisor = options.supervisor
    this.analyzer = options.analyzer
    this.fileReporter = options.fileReporter
  }

  static async init({
    dataDir,
    configName,
    configOverrides,
    files,
    logger = createRootLogger(),
    client,
  }: RecorderInitOptions = {}): Promise<Recorder> {
    if (!files) {
      files = await new NodeFileProvider().init()
    }

    dataDir = dataDir || DEFAULT_DATA_DIR

    const config = new RecorderConfig(files, dataDir, configName)
    await config.load()

    if (configOverrides) {
      Object.assign(config.overrides, configOverrides)
    }

    setLogLevelFromConfig(config.get('logLevel'))

    const logPrefix = config.get('logPrefix')
    if (logPrefix) {
      setLogPrefixFromConfig(logPrefix)
    }

    setLogColorEnabledFromConfig(config.get('logColors'))
    setJSONLoggingFromConfig(config.get('jsonLogs'))

    config.onConfigChange.on((key) => {
      if (key === 'logLevel') {
        setLogLevelFromConfig(config.get('logLevel'))
      }
    })

    let fileReporter: FileReporter | null = null
    if (config.get('enableLogFile')) {
      fileReporter = new FileReporter(config.logFilePath)
      fileReporter.logToJSON = config.get('jsonLogs')
      logger.addReporter(fileReporter)
    }

    const store = new SampleStore({
      files,
      logger,
      directory: config.get('samplesDir'),
      timeZone: config.get('timeZone'),
    })

    const stateStore = new SequenceStateStore(files, config.dataDir, { logger })
    await stateStore.load()

    const supervisor = new Supervisor({
      client:
        client ??
        new MTConnectClient({
          includeConditions: config.get('includeConditions'),
          timestampSource: config.get('timestampSource'),
        }),
      store,
      logger,
      stateStore,
      stateFlushIntervalMs: config.get('stateFlushIntervalMs'),
      reorderWindow: config.get('reorderWindow'),
      backoffMaxIntervals: config.get('backoffMaxIntervals'),
      backoffJitter: config.get('backoffJitter'),
      recordUnchangedSequence: config.get('recordUnchangedSequence'),
    })

    const analyzer = new IntegrityAnalyzer({
      store,
      logger,
      reorderWindow: config.get('reorderWindow'),
      targetRateHz: 1000 / config.get('pollIntervalMs'),
      sourceTargetRateHz: (sourceId) => {
        const source = config.get('sources').find((s) => s.sourceId === sourceId)
        if (!source) {
          return undefined
        }
        return 1000 / toSourceConfig(source, config.get('pollIntervalMs')).pollIntervalMs
      },
      thresholdHz: config.get('samplingRateThresholdHz'),
    })

    return new Recorder({
      config,
      files,
      logger,
      store,
      stateStore,
      supervisor,
      analyzer,
      fileReporter,
    })
  }

  /**
   * Starts polling every configured source
   *
   * @throws ConfigError if the configured sources are invalid
   */
  start(): void {
    const pollIntervalMs = this.config.get('pollIntervalMs')
    const sources = this.config.get('sources').map((s) => toSourceConfig(s, pollIntervalMs))

    if (sources.length === 0) {
      this.logger.warn(`No sources configured in ${this.config.storage.filePath}`)
    }

    this.logger.info(`Writing samples to ${this.store.directory} (${this.store.timeZone})`)
    this.supervisor.start(sources)
  }

  async stop(): Promise<void> {
    await this.supervisor.stop()

    if (this.fileReporter) {
      this.rootLogger.removeReporter(this.fileReporter)
      await this.fileReporter.close()
    }
  }
}
