/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export class ParseJsonError extends Error {
  jsonFileName: string
  jsonMessage: string

  constructor(fileName: string, message: string) {
    super(`Parsing ${fileName} Failed\n${message}`)
    this.jsonFileName = fileName
    this.jsonMessage = message
  }
}

function tryParse(data: string, fileName?: string): [unknown, null] | [null, ParseJsonError] {
  try {
    const parsed: unknown = JSON.parse(data)
    return [parsed, null]
  } catch (e) {
    if (e instanceof SyntaxError) {
      return [null, new ParseJsonError(fileName || '<unknown>', e.message)]
    }

    throw e
  }
}

function parse(data: string, fileName?: string): unknown {
  const [result, error] = tryParse(data, fileName)
  if (error) {
    throw error
  }
  return result
}

export const JSONUtils = { parse, tryParse }
