/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export * from './backoff'
export * from './error'
export * from './json'
export * from './math'
export * from './promise'
export * from './time'
export * from './timestamp'
export * from './types'
export * from './yup'
