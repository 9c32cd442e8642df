/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ConfigError, RecorderError, StorageError, TransportError } from './errors'

describe('errors', () => {
  it('renders transport errors with their kind and address', () => {
    const error = new TransportError('http', 'http://agent.test:5000', 'status 503', {
      status: 503,
    })

    expect(error).toBeInstanceOf(RecorderError)
    expect(error.name).toEqual('TransportError')
    expect(error.message).toEqual('http error from http://agent.test:5000: status 503')
    expect(error.status).toEqual(503)
  })

  it('defaults the transport status to null', () => {
    const error = new TransportError('timeout', 'http://agent.test:5000', 'no response')
    expect(error.status).toBeNull()
  })

  it('keeps the path of storage errors', () => {
    const cause = new Error('ENOSPC')
    const error = new StorageError('/data/VTC/2025-06-03.jsonl', 'append failed', cause)

    expect(error.name).toEqual('StorageError')
    expect(error.path).toEqual('/data/VTC/2025-06-03.jsonl')
    expect(error.error).toBe(cause)
    expect(error.message).toEqual('Storage failure at /data/VTC/2025-06-03.jsonl: append failed')
  })

  it('names config errors', () => {
    expect(new ConfigError('duplicate source VTC').name).toEqual('ConfigError')
  })
})
