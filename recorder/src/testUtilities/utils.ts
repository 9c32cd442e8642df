/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import path from 'path'
import { v4 as uuid } from 'uuid'
import { PromiseUtils } from '../utils'

/** Parent of every directory a test writes samples, config or state to */
export const TEST_DATA_DIR = path.join(process.cwd(), 'testdbs')

export function getUniqueTestDataDir(): string {
  return path.join(TEST_DATA_DIR, uuid())
}

/**
 * Lets work queued behind a setTimeout(0) or an already resolved promise run
 */
export async function flushTimeout(): Promise<void> {
  await PromiseUtils.sleep(0)
}
