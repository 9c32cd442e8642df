/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import nock from 'nock'
import { TransportError } from '../errors'
import { UNAVAILABLE } from '../primitives'
import { readFixture } from '../testUtilities'
import { MTConnectClient } from './mtconnectClient'

const AGENT = 'http://agent.test:5000'
const ADDRESS = `${AGENT}/VTC/current`

async function expectTransportError(promise: Promise<unknown>): Promise<TransportError> {
  const error: unknown = await promise.then(
    () => null,
    (e: unknown) => e,
  )

  expect(error).toBeInstanceOf(TransportError)
  if (!(error instanceof TransportError)) {
    throw new Error('Expected a TransportError')
  }
  return error
}

describe('MTConnectClient', () => {
  beforeEach(() => {
    nock.cleanAll()
  })

  afterEach(() => {
    const pending = nock.pendingMocks()
    nock.abortPendingRequests()
    nock.cleanAll()
    // eslint-disable-next-line jest/no-standalone-expect
    expect(pending).toEqual([])
  })

  it('returns the sequence and values of the current document', async () => {
    nock(AGENT).get('/VTC/current').reply(200, readFixture('current.xml'))

    const client = new MTConnectClient()
    const snapshot = await client.fetch(ADDRESS, { timeoutMs: 1000 })

    expect(snapshot.sequence).toBe(249)
    expect(snapshot.timestamp).toBeNull()
    expect(snapshot.values['SpindleSpeed']).toBe(1200)
    expect(snapshot.values['c1_temp']).toBe(UNAVAILABLE)
    expect(snapshot.values['c1_cond']).toBeUndefined()
  })

  it('uses the agent creation time when configured', async () => {
    nock(AGENT).get('/VTC/current').reply(200, readFixture('current.xml'))

    const client = new MTConnectClient({ timestampSource: 'agent', includeConditions: true })
    const snapshot = await client.fetch(ADDRESS, { timeoutMs: 1000 })

    expect(snapshot.timestamp).toEqual('2025-06-03T08:00:00.000000Z')
    expect(snapshot.values['c1_cond']).toEqual('Normal')
  })

  it('reports http errors with their status', async () => {
    nock(AGENT).get('/VTC/current').reply(503, 'Service Unavailable')

    const error = await expectTransportError(
      new MTConnectClient().fetch(ADDRESS, { timeoutMs: 1000 }),
    )

    expect(error.kind).toBe('http')
    expect(error.status).toBe(503)
    expect(error.address).toBe(ADDRESS)
  })

  it('reports refused connections', async () => {
    nock(AGENT)
      .get('/VTC/current')
      .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED 10.0.0.1:5000' })

    const error = await expectTransportError(
      new MTConnectClient().fetch(ADDRESS, { timeoutMs: 1000 }),
    )

    expect(error.kind).toBe('connection')
  })

  it('reports responses slower than the timeout', async () => {
    nock(AGENT).get('/VTC/current').delay(500).reply(200, readFixture('current.xml'))

    const error = await expectTransportError(
      new MTConnectClient().fetch(ADDRESS, { timeoutMs: 50 }),
    )

    expect(error.kind).toBe('timeout')
    expect(error.message).toBe(`timeout error from ${ADDRESS}: No response within 50ms`)
  })

  it('reports aborted requests', async () => {
    const scope = nock(AGENT).get('/VTC/current').delay(500).reply(200, readFixture('current.xml'))

    const controller = new AbortController()
    // Abort once the request has reached the agent
    scope.on('request', () => setImmediate(() => controller.abort()))

    const result = new MTConnectClient().fetch(ADDRESS, {
      timeoutMs: 1000,
      signal: controller.signal,
    })

    const error = await expectTransportError(result)
    expect(error.kind).toBe('aborted')
  })

  it('reports documents it cannot parse as malformed', async () => {
    nock(AGENT).get('/VTC/current').reply(200, '<html><body>login</body></html>')

    const error = await expectTransportError(
      new MTConnectClient().fetch(ADDRESS, { timeoutMs: 1000 }),
    )

    expect(error.kind).toBe('malformed')
    expect(error.message).toContain('Missing MTConnectStreams element')
  })
})
