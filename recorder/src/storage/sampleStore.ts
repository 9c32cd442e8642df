/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { formatInTimeZone } from 'date-fns-tz'
import { StorageError } from '../errors'
import { FileSystem } from '../fileSystems'
import { Logger } from '../logger'
import { Mutex } from '../mutex'
import { isValidSourceId, Sample } from '../primitives'
import { ErrorUtils, TimestampUtils } from '../utils'
import { SampleRecordEncoding } from './sampleRecord'

export const PARTITION_EXTENSION = '.jsonl'
const PARTITION_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export type SampleStoreOptions = {
  files: FileSystem
  logger: Logger
  /** Root directory holding one directory per source */
  directory: string
  /** IANA zone that decides the calendar day of a sample */
  timeZone?: string
}

/**
 * Append-only sample storage partitioned by source and calendar day:
 * `<directory>/<sourceId>/<yyyy-MM-dd>.jsonl`, one JSON record per line.
 *
 * Appends to one partition are serialized. Appends to different partitions
 * run concurrently.
 */
export class SampleStore {
  readonly files: FileSystem
  readonly directory: string
  readonly timeZone: string
  private readonly logger: Logger
  private readonly partitionLocks = new Map<string, Mutex>()
  private readonly createdDirectories = new Set<string>()
  private readonly checkedPartitions = new Set<string>()

  constructor(options: SampleStoreOptions) {
    this.files = options.files
    this.directory = options.files.resolve(options.directory)
    this.timeZone = options.timeZone ?? 'UTC'
    this.logger = options.logger.withTag('store')
  }

  /**
   * The calendar day of a timestamp in the store's time zone
   */
  partitionDate(timestamp: string): string {
    return formatInTimeZone(TimestampUtils.toDate(timestamp), this.timeZone, 'yyyy-MM-dd')
  }

  partitionPath(sourceId: string, date: string): string {
    if (!isValidSourceId(sourceId)) {
      throw new StorageError(this.directory, `Invalid source id '${sourceId}'`)
    }

    if (!PARTITION_DATE_PATTERN.test(date)) {
      throw new StorageError(this.directory, `Invalid partition date '${date}'`)
    }

    return this.files.join(this.directory, sourceId, `${date}${PARTITION_EXTENSION}`)
  }

  /**
   * Appends the sample as one line of its day's partition, creating the
   * partition if needed. Late samples for an earlier day are still appended.
   *
   * @throws StorageError if the sample could not be written
   */
  async append(sourceId: string, sample: Sample): Promise<void> {
    const path = this.partitionPath(sourceId, this.partitionDate(sample.timestamp))

    if (sample.sourceId !== sourceId) {
      throw new StorageError(path, `Sample from '${sample.sourceId}' appended to '${sourceId}'`)
    }

    const line = `${SampleRecordEncoding.encode(sample)}\n`

    let lock = this.partitionLocks.get(path)
    if (!lock) {
      lock = new Mutex()
      this.partitionLocks.set(path, lock)
    }

    try {
      await lock.dispatch(() => this.write(path, line))
    } catch (e: unknown) {
      this.createdDirectories.delete(this.files.dirname(path))
      this.checkedPartitions.delete(path)
      throw new StorageError(path, ErrorUtils.renderError(e), e)
    } finally {
      if (lock.pending === 0) {
        this.partitionLocks.delete(path)
      }
    }
  }

  /**
   * Samples of one partition in append order. Each iteration re-reads the
   * file, and a missing partition yields nothing. Lines that cannot be decoded
   * are logged and skipped.
   */
  readPartition(sourceId: string, date: string): AsyncIterable<Sample> {
    const path = this.partitionPath(sourceId, date)

    return {
      [Symbol.asyncIterator]: () => this.readSamples(sourceId, path),
    }
  }

  /**
   * Source ids that have at least one partition directory
   */
  async listSources(): Promise<string[]> {
    const entries = await this.list(this.directory)
    return entries.filter(isValidSourceId)
  }

  /**
   * Dates of the partitions of a source, oldest first
   */
  async listDates(sourceId: string): Promise<string[]> {
    if (!isValidSourceId(sourceId)) {
      return []
    }

    const entries = await this.list(this.files.join(this.directory, sourceId))

    return entries
      .filter((entry) => entry.endsWith(PARTITION_EXTENSION))
      .map((entry) => entry.slice(0, -PARTITION_EXTENSION.length))
      .filter((date) => PARTITION_DATE_PATTERN.test(date))
  }

  private async write(path: string, line: string): Promise<void> {
    const directory = this.files.dirname(path)

    if (!this.createdDirectories.has(directory)) {
      await this.files.mkdir(directory, { recursive: true })
      this.createdDirectories.add(directory)
    }

    let prefix = ''
    if (!this.checkedPartitions.has(path)) {
      prefix = await this.terminatePartialLine(path)
      this.checkedPartitions.add(path)
    }

    await this.files.appendFile(path, prefix + line)
  }

  /**
   * A partition cut off mid-line by a crash would otherwise fuse its last
   * line with the next record. Returns the prefix that closes the torn line.
   */
  private async terminatePartialLine(path: string): Promise<string> {
    if (!(await this.files.exists(path))) {
      return ''
    }

    const last = await this.files.readLastChar(path)
    if (last === null || last === '\n') {
      return ''
    }

    this.logger.warn(`Terminating a partial last line in ${path}`)
    return '\n'
  }

  private async list(directory: string): Promise<string[]> {
    if (!(await this.files.exists(directory))) {
      return []
    }

    try {
      return await this.files.readdir(directory)
    } catch (e: unknown) {
      throw new StorageError(directory, ErrorUtils.renderError(e), e)
    }
  }

  private async *readSamples(sourceId: string, path: string): AsyncGenerator<Sample, void> {
    if (!(await this.files.exists(path))) {
      return
    }

    let lineNumber = 0
    const lines = this.files.readLines(path)[Symbol.asyncIterator]()

    try {
      for (;;) {
        let next: IteratorResult<string>
        try {
          next = await lines.next()
        } catch (e: unknown) {
          throw new StorageError(path, ErrorUtils.renderError(e), e)
        }

        if (next.done) {
          return
        }

        lineNumber++
        const line = next.value
        if (line.trim().length === 0) {
          continue
        }

        const decoded = SampleRecordEncoding.decode(line)
        if (decoded.sample === null) {
          this.logger.warn(`Skipping line ${lineNumber} of ${path}: ${decoded.error.message}`)
          continue
        }

        const sample = decoded.sample

        if (sample.sourceId !== sourceId) {
          this.logger.warn(
            `Skipping line ${lineNumber} of ${path}: sample belongs to '${sample.sourceId}'`,
          )
          continue
        }

        yield sample
      }
    } finally {
      await lines.return?.()
    }
  }
}
