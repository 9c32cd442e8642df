/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
export * from './analyzer'
export * from './endpoint'
export * from './errors'
export * from './event'
export * from './fileStores'
export * from './fileSystems'
export * from './logger'
export * from './mutex'
export * from './poller'
export * from './primitives'
export * from './recorder'
export * from './sequence'
export * from './storage'
export * from './supervisor'
export * from './utils'
