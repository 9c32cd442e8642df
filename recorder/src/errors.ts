/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * The base class for errors raised by the recorder. Sequence anomalies are
 * not errors and are reported through a GapReport instead.
 */
export class RecorderError extends Error {
  override name = this.constructor.name
}

export type TransportErrorKind = 'connection' | 'timeout' | 'http' | 'malformed' | 'aborted'

/**
 * Thrown by an EndpointClient when a snapshot could not be fetched. Pollers
 * retry these with backoff and never stop because of one.
 */
export class TransportError extends RecorderError {
  kind: TransportErrorKind
  address: string
  status: number | null
  error: unknown

  constructor(
    kind: TransportErrorKind,
    address: string,
    message: string,
    options?: { status?: number; error?: unknown },
  ) {
    super(`${kind} error from ${address}: ${message}`)
    this.kind = kind
    this.address = address
    this.status = options?.status ?? null
    this.error = options?.error
  }
}

/** Thrown when the sample store could not append or read a partition */
export class StorageError extends RecorderError {
  path: string
  error: unknown

  constructor(path: string, message: string, error?: unknown) {
    super(`Storage failure at ${path}: ${message}`)
    this.path = path
    this.error = error
  }
}

/** Thrown at startup when the configuration cannot be used */
export class ConfigError extends RecorderError {}
