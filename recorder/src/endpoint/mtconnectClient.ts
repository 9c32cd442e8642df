/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import axios, { AxiosAdapter } from 'axios'
import { TransportError } from '../errors'
import { TimestampSource } from '../fileStores'
import { ErrorUtils } from '../utils'
import { EndpointClient, EndpointFetchOptions, EndpointSnapshot } from './endpointClient'
import { MTConnectParseError, parseMTConnectStreams } from './mtconnect'

export type MTConnectClientOptions = {
  includeConditions?: boolean
  /**
   * `agent` uses the Header creationTime as the sample timestamp. `local`
   * leaves it to the caller to stamp the receive time.
   */
  timestampSource?: TimestampSource
  adapter?: AxiosAdapter
}

/**
 * Reads an MTConnect agent over HTTP. The endpoint address is the full URL
 * of the request, usually `http://<agent>/current` or
 * `http://<agent>/<device>/current`.
 */
export class MTConnectClient implements EndpointClient {
  readonly includeConditions: boolean
  readonly timestampSource: TimestampSource
  private readonly adapter?: AxiosAdapter

  constructor(options: MTConnectClientOptions = {}) {
    this.includeConditions = options.includeConditions ?? false
    this.timestampSource = options.timestampSource ?? 'local'
    this.adapter = options.adapter
  }

  async fetch(address: string, options: EndpointFetchOptions): Promise<EndpointSnapshot> {
    const xml = await this.request(address, options)

    try {
      const streams = parseMTConnectStreams(xml, { includeConditions: this.includeConditions })

      return {
        sequence: streams.lastSequence,
        timestamp: this.timestampSource === 'agent' ? streams.creationTime : null,
        values: streams.values,
      }
    } catch (e: unknown) {
      if (e instanceof MTConnectParseError) {
        throw new TransportError('malformed', address, e.message, { error: e })
      }
      throw e
    }
  }

  private async request(address: string, options: EndpointFetchOptions): Promise<string> {
    try {
      const response = await axios.get<string>(address, {
        timeout: options.timeoutMs,
        signal: options.signal,
        adapter: this.adapter,
        responseType: 'text',
        // Keep the body as text, axios would otherwise try JSON
        transformResponse: (data: unknown) => data,
      })

      if (typeof response.data !== 'string') {
        throw new TransportError('malformed', address, 'Response body is not text')
      }

      return response.data
    } catch (e: unknown) {
      if (e instanceof TransportError) {
        throw e
      }

      throw toTransportError(address, e, options.timeoutMs)
    }
  }
}

function toTransportError(address: string, error: unknown, timeoutMs: number): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError('aborted', address, 'Request was aborted', { error })
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new TransportError('http', address, `Request failed with status ${error.response.status}`, {
        status: error.response.status,
        error,
      })
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransportError('timeout', address, `No response within ${timeoutMs}ms`, {
        error,
      })
    }
  }

  return new TransportError('connection', address, ErrorUtils.renderError(error), { error })
}
