/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { EndpointClient, EndpointFetchOptions, EndpointSnapshot } from '../../endpoint'
import { TransportError } from '../../errors'
import { FieldValue } from '../../primitives'

export type FakeResponse =
  | EndpointSnapshot
  | Error
  | ((address: string, options: EndpointFetchOptions) => Promise<EndpointSnapshot>)

export function snapshot(
  sequence: number,
  values: Record<string, FieldValue> = {},
  timestamp: string | null = null,
): EndpointSnapshot {
  return { sequence, timestamp, values }
}

/**
 * Answers fetches from a queue of scripted responses, then from `fallback`
 */
export class FakeEndpointClient implements EndpointClient {
  readonly calls: Array<{ address: string; options: EndpointFetchOptions }> = []
  fallback: FakeResponse | null = null
  private readonly responses: FakeResponse[] = []

  enqueue(...responses: FakeResponse[]): this {
    this.responses.push(...responses)
    return this
  }

  fetch(address: string, options: EndpointFetchOptions): Promise<EndpointSnapshot> {
    this.calls.push({ address, options })
    const response = this.responses.shift() ?? this.fallback

    if (response === null) {
      return Promise.reject(new TransportError('connection', address, 'No scripted response'))
    }

    if (response instanceof Error) {
      return Promise.reject(response)
    }

    if (typeof response === 'function') {
      return response(address, options)
    }

    return Promise.resolve({ ...response, values: { ...response.values } })
  }
}
