/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { FieldValue } from '../primitives'

/**
 * What one successful fetch returns. `timestamp` is null when the endpoint
 * does not supply one and the receive time should be used.
 */
export type EndpointSnapshot = {
  sequence: number
  timestamp: string | null
  values: Record<string, FieldValue>
}

export type EndpointFetchOptions = {
  /** The fetch must settle within this many milliseconds */
  timeoutMs: number
  signal?: AbortSignal
}

/**
 * Fetches the current snapshot of a machine endpoint. Implementations reject
 * with a TransportError when the endpoint cannot be reached or its response
 * cannot be understood.
 */
export interface EndpointClient {
  fetch(address: string, options: EndpointFetchOptions): Promise<EndpointSnapshot>
}
