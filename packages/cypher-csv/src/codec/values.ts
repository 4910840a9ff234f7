/**
 * Value Encoding
 *
 * Maps runtime property values to (type tag, cell text) and back.
 * CSV quoting is not applied here; the table writer quotes whole cells.
 */

import { UnsupportedTypeError } from '../errors'
import type { PropertyValue, ScalarValue } from '../graph/types'
import { elementTag, isArrayTag, type ScalarTag, type TypeTag } from './types'

/**
 * Tag observed for a single value during inference. `'[]'` marks an empty
 * array, whose element type is unknown.
 */
export type ObservedTag = TypeTag | '[]'

/**
 * Result of decoding a single cell.
 * `value` is undefined for an empty cell (absent property).
 */
export type DecodedCell = { ok: true; value: PropertyValue | undefined } | { ok: false }

const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

function isScalar(value: unknown): value is ScalarValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'bigint':
      return true
    case 'number':
      return Number.isFinite(value)
    default:
      return false
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'nested array'
  if (value instanceof Date) return 'date'
  if (typeof value === 'number') return `non-finite number ${String(value)}`
  return typeof value
}

// =============================================================================
// INFERENCE
// =============================================================================

/**
 * Tag of a single scalar value.
 * @throws UnsupportedTypeError if the value has no scalar tag
 */
export function scalarTagOf(key: string, value: unknown): ScalarTag {
  if (!isScalar(value)) {
    throw new UnsupportedTypeError(key, value, `${describeValue(value)} values have no type tag`)
  }
  if (typeof value === 'boolean') return 'boolean'
  if (typeof value === 'bigint') return 'int'
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float'
  return 'string'
}

/**
 * Infer the tag of a property value. Returns undefined for null/undefined.
 * Integers and floats may share an array (widened to `float[]`); any other
 * mix of element types is rejected.
 * @throws UnsupportedTypeError
 */
export function inferTag(key: string, value: unknown): ObservedTag | undefined {
  if (value === null || value === undefined) return undefined
  if (!Array.isArray(value)) return scalarTagOf(key, value)
  if (value.length === 0) return '[]'

  let tag: ScalarTag | undefined
  for (const element of value) {
    const current = scalarTagOf(key, element)
    if (tag === undefined || tag === current) {
      tag = current
    } else if ((tag === 'int' || tag === 'float') && (current === 'int' || current === 'float')) {
      tag = 'float'
    } else {
      throw new UnsupportedTypeError(key, value, `mixed-type array (${tag} and ${current})`)
    }
  }
  return `${tag ?? 'string'}[]`
}

// =============================================================================
// ENCODING
// =============================================================================

function formatInteger(value: number): string {
  return Number.isSafeInteger(value) ? String(value) : BigInt(value).toString()
}

/**
 * Render a number so that it always reads back as a float.
 */
export function formatFloat(value: number | bigint): string {
  if (typeof value === 'bigint') return `${value.toString()}.0`
  if (Object.is(value, -0)) return '-0.0'
  const text = String(value)
  return INTEGER_PATTERN.test(text) ? `${text}.0` : text
}

function mismatch(key: string, value: unknown, tag: TypeTag): UnsupportedTypeError {
  return new UnsupportedTypeError(key, value, `${describeValue(value)} value in a ${tag} column`)
}

/**
 * Render a scalar under a scalar tag.
 * @throws UnsupportedTypeError
 */
export function encodeScalar(key: string, value: unknown, tag: ScalarTag): string {
  if (!isScalar(value)) {
    throw new UnsupportedTypeError(key, value, `${describeValue(value)} values have no type tag`)
  }

  switch (tag) {
    case 'boolean':
      if (typeof value !== 'boolean') throw mismatch(key, value, tag)
      return value ? 'true' : 'false'
    case 'int':
      if (typeof value === 'bigint') return value.toString()
      if (typeof value === 'number' && Number.isInteger(value)) return formatInteger(value)
      throw mismatch(key, value, tag)
    case 'float':
      if (typeof value === 'number' || typeof value === 'bigint') return formatFloat(value)
      throw mismatch(key, value, tag)
    case 'string':
      if (typeof value === 'string') return value
      if (typeof value === 'boolean') return value ? 'true' : 'false'
      if (typeof value === 'bigint') return value.toString()
      return Number.isInteger(value) ? formatInteger(value) : String(value)
  }
}

/**
 * Join array elements with the array delimiter. Elements may not contain
 * the delimiter, and string elements may not be empty at either end.
 * @throws UnsupportedTypeError
 */
export function joinArray(
  key: string,
  values: readonly unknown[],
  tag: ScalarTag,
  delimiter: string,
): string {
  const parts = values.map((element) => encodeScalar(key, element, tag))
  for (const part of parts) {
    if (part.includes(delimiter)) {
      throw new UnsupportedTypeError(key, values, `array element contains the array delimiter '${delimiter}'`)
    }
  }
  if (parts.length > 0 && (parts[0] === '' || parts[parts.length - 1] === '')) {
    throw new UnsupportedTypeError(key, values, 'array starts or ends with an empty string')
  }
  return parts.join(delimiter)
}

/**
 * Encode a property value under its column tag. Absent values and empty
 * arrays become an empty cell.
 * @throws UnsupportedTypeError
 */
export function encodeValue(key: string, value: unknown, tag: TypeTag, delimiter: string): string {
  if (value === null || value === undefined) return ''

  if (Array.isArray(value)) {
    return joinArray(key, value, elementTag(tag), delimiter)
  }

  if (isArrayTag(tag)) {
    throw mismatch(key, value, tag)
  }
  return encodeScalar(key, value, tag)
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Parse a cell's text under a scalar tag. Returns undefined when the text
 * is not valid for the tag.
 */
export function decodeScalar(text: string, tag: ScalarTag): ScalarValue | undefined {
  switch (tag) {
    case 'string':
      return text
    case 'boolean': {
      const lowered = text.toLowerCase()
      if (lowered === 'true') return true
      if (lowered === 'false') return false
      return undefined
    }
    case 'int': {
      if (!INTEGER_PATTERN.test(text)) return undefined
      const value = Number(text)
      return Number.isSafeInteger(value) ? value : BigInt(text.replace(/^\+/, ''))
    }
    case 'float': {
      if (!FLOAT_PATTERN.test(text)) return undefined
      const value = Number(text)
      return Number.isFinite(value) ? value : undefined
    }
  }
}

/**
 * Split an array cell. One leading and one trailing empty segment are
 * dropped, so a lone delimiter is an empty array.
 */
export function splitArray(text: string, delimiter: string): string[] {
  const segments = text.split(delimiter)
  if (segments[0] === '') segments.shift()
  if (segments.length > 0 && segments[segments.length - 1] === '') segments.pop()
  return segments
}

/**
 * Decode a cell's text under its column tag.
 */
export function decodeValue(text: string, tag: TypeTag, delimiter: string): DecodedCell {
  if (text === '') return { ok: true, value: undefined }

  if (!isArrayTag(tag)) {
    const value = decodeScalar(text, tag)
    return value === undefined ? { ok: false } : { ok: true, value }
  }

  const element = elementTag(tag)
  const values: ScalarValue[] = []
  for (const segment of splitArray(text, delimiter)) {
    const value = decodeScalar(segment, element)
    if (value === undefined) return { ok: false }
    values.push(value)
  }
  return { ok: true, value: values }
}

// =============================================================================
// LABELS
// =============================================================================

/**
 * Encode a vertex's labels as a `:LABEL` cell.
 * @throws UnsupportedTypeError
 */
export function encodeLabels(labels: readonly string[] | undefined, delimiter: string): string {
  if (!labels || labels.length === 0) return ''
  for (const label of labels) {
    if (typeof label !== 'string' || label === '' || label.includes(delimiter)) {
      throw new UnsupportedTypeError(
        ':LABEL',
        labels,
        'labels must be non-empty strings without the array delimiter',
      )
    }
  }
  return labels.join(delimiter)
}

/**
 * Decode a `:LABEL` cell. Empty segments are ignored; returns undefined
 * when no label remains.
 */
export function decodeLabels(text: string, delimiter: string): string[] | undefined {
  const labels = text.split(delimiter).filter((label) => label !== '')
  return labels.length > 0 ? labels : undefined
}
