/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { createRootLogger } from './logger'
import { Recorder } from './recorder'
import { ErrorUtils } from './utils'

type SIGNALS = 'SIGTERM' | 'SIGINT'

const FORCE_CLOSE_MS = 5000

async function main(): Promise<void> {
  const logger = createRootLogger()

  const recorder = await Recorder.init({
    dataDir: process.env.RECORDER_DATA_DIR || undefined,
    logger,
  })

  let closing = false
  const signals: SIGNALS[] = ['SIGINT', 'SIGTERM']

  for (const signal of signals) {
    process.once(signal, () => {
      if (closing) {
        return
      }
      closing = true

      setTimeout(() => {
        logger.error(`Force closing after ${FORCE_CLOSE_MS}ms`)
        process.exit(1)
      }, FORCE_CLOSE_MS).unref()

      logger.info(`Shutting down after ${signal}`)

      void recorder
        .stop()
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          logger.error(`Failed to close: ${ErrorUtils.renderError(e, true)}`)
          process.exit(1)
        })
    })
  }

  recorder.start()
}

main().catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error(ErrorUtils.renderError(e, true))
  process.exit(1)
})
