/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { RecorderError } from '../errors'
import { FieldValue, isValidSequence, UNAVAILABLE } from '../primitives'
import { isRecord, TimestampUtils } from '../utils'

const VALUE_SECTIONS = ['Samples', 'Events']
const CONDITION_SECTION = 'Condition'
const UNAVAILABLE_TEXT = 'UNAVAILABLE'
const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/

export class MTConnectParseError extends RecorderError {}

export type MTConnectStreams = {
  /** Header lastSequence */
  lastSequence: number
  /** Header creationTime, normalized, when the agent sent a valid one */
  creationTime: string | null
  values: Record<string, FieldValue>
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  alwaysCreateTextNode: true,
  trimValues: true,
})

const isMarkup = (key: string): boolean => key.startsWith('@_') || key === '#text'

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : [value])

function attribute(node: unknown, name: string): string | null {
  if (!isRecord(node)) {
    return null
  }

  const value = node[`@_${name}`]
  return typeof value === 'string' && value.length > 0 ? value : null
}

/**
 * Converts element text to a field value. Numeric text becomes a number, and
 * empty or UNAVAILABLE text becomes the UNAVAILABLE sentinel.
 */
export function parseFieldValue(text: unknown): FieldValue {
  if (typeof text === 'number') {
    return Number.isFinite(text) ? text + 0 : String(text)
  }

  if (typeof text !== 'string') {
    return UNAVAILABLE
  }

  const trimmed = text.trim()
  if (trimmed.length === 0 || trimmed.toUpperCase() === UNAVAILABLE_TEXT) {
    return UNAVAILABLE
  }

  if (NUMERIC_PATTERN.test(trimmed)) {
    const value = Number(trimmed)
    if (Number.isFinite(value)) {
      // -0 would be stored as 0
      return value + 0
    }
  }

  return trimmed
}

function elementText(element: unknown): unknown {
  return isRecord(element) ? element['#text'] : element
}

function collectSection(
  section: unknown,
  isCondition: boolean,
  values: Record<string, FieldValue>,
): void {
  if (!isRecord(section)) {
    return
  }

  for (const [tag, elements] of Object.entries(section)) {
    if (isMarkup(tag)) {
      continue
    }

    for (const element of asArray(elements)) {
      const key = attribute(element, 'name') ?? attribute(element, 'dataItemId') ?? tag

      if (isCondition) {
        // The state of a condition is the element name, e.g. Normal or Fault
        values[key] = tag.toUpperCase() === UNAVAILABLE_TEXT ? UNAVAILABLE : tag
      } else {
        values[key] = parseFieldValue(elementText(element))
      }
    }
  }
}

function walk(node: unknown, sections: ReadonlyArray<string>, values: Record<string, FieldValue>): void {
  for (const item of asArray(node)) {
    if (!isRecord(item)) {
      continue
    }

    for (const [tag, child] of Object.entries(item)) {
      if (isMarkup(tag)) {
        continue
      }

      if (sections.includes(tag)) {
        for (const section of asArray(child)) {
          collectSection(section, tag === CONDITION_SECTION, values)
        }
      } else {
        walk(child, sections, values)
      }
    }
  }
}

function agentError(document: Record<string, unknown>): string | null {
  const error = document['MTConnectError']
  if (error === undefined) {
    return null
  }

  const messages: string[] = []
  const errors = isRecord(error) ? error['Errors'] : undefined
  const entries = isRecord(errors) ? asArray(errors['Error']) : []

  for (const entry of entries) {
    const code = attribute(entry, 'errorCode')
    const text = elementText(entry)
    messages.push([code, typeof text === 'string' ? text : null].filter(Boolean).join(': '))
  }

  return messages.length > 0 ? messages.join(', ') : 'unknown error'
}

/**
 * Parses an MTConnectStreams document as returned by an agent's `current`
 * request. Values are read from every Samples and Events section, and from
 * Condition sections when `includeConditions` is set. Each value is keyed by
 * its name, then its dataItemId, then its element name.
 *
 * @throws MTConnectParseError if the document is not a usable MTConnectStreams
 */
export function parseMTConnectStreams(
  xml: string,
  options: { includeConditions?: boolean } = {},
): MTConnectStreams {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new MTConnectParseError(
      `Invalid XML at line ${validation.err.line}: ${validation.err.msg}`,
    )
  }

  const document: unknown = parser.parse(xml)
  if (!isRecord(document)) {
    throw new MTConnectParseError('Empty document')
  }

  const error = agentError(document)
  if (error !== null) {
    throw new MTConnectParseError(`Agent returned an error: ${error}`)
  }

  const root = document['MTConnectStreams']
  if (!isRecord(root)) {
    throw new MTConnectParseError('Missing MTConnectStreams element')
  }

  const header = root['Header']
  const lastSequence = attribute(header, 'lastSequence')
  if (lastSequence === null) {
    throw new MTConnectParseError('Missing Header lastSequence')
  }

  const sequence = Number(lastSequence)
  if (!/^\d+$/.test(lastSequence) || !isValidSequence(sequence)) {
    throw new MTConnectParseError(`Invalid Header lastSequence '${lastSequence}'`)
  }

  const creation = attribute(header, 'creationTime')
  const creationTime =
    creation !== null && TimestampUtils.isValid(creation) ? TimestampUtils.normalize(creation) : null

  const sections = options.includeConditions
    ? [...VALUE_SECTIONS, CONDITION_SECTION]
    : VALUE_SECTIONS

  const values: Record<string, FieldValue> = {}
  walk(root['Streams'], sections, values)

  return { lastSequence: sequence, creationTime, values }
}
