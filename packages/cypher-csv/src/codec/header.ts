/**
 * Header Codec
 *
 * Synthesizes typed header rows and parses them back into column layouts.
 */

import { MalformedHeaderError, type TableKind } from '../errors'
import {
  END_ID_COLUMN,
  ID_COLUMN,
  LABEL_COLUMN,
  LABEL_HEADER,
  RESERVED_PROPERTY_KEY,
  START_ID_COLUMN,
  TYPE_COLUMN,
  type EdgeTableHeader,
  type ScalarTag,
  type TypeTag,
  type VertexTableHeader,
} from './types'

// =============================================================================
// FORMATTING
// =============================================================================

export function formatVertexHeader(header: VertexTableHeader): string[] {
  return [
    ID_COLUMN,
    ...header.properties.map((column) => `${column.name}:${column.tag}`),
    ...(header.hasLabels ? [LABEL_HEADER] : []),
  ]
}

export function formatEdgeHeader(header: EdgeTableHeader): string[] {
  return [
    START_ID_COLUMN,
    END_ID_COLUMN,
    ...(header.hasType ? [TYPE_COLUMN] : []),
    ...header.properties.map((column) => `${column.name}:${column.tag}`),
  ]
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Type names accepted in headers, including the Neo4j import aliases.
 */
const TAG_ALIASES = new Map<string, ScalarTag>([
  ['int', 'int'],
  ['long', 'int'],
  ['short', 'int'],
  ['byte', 'int'],
  ['float', 'float'],
  ['double', 'float'],
  ['string', 'string'],
  ['boolean', 'boolean'],
])

/**
 * A parsed header cell.
 */
export type HeaderColumn =
  | { kind: 'id' }
  | { kind: 'start' }
  | { kind: 'end' }
  | { kind: 'label' }
  | { kind: 'type' }
  | { kind: 'property'; name: string; tag: TypeTag }

/**
 * A property column bound to its cell position.
 */
export interface BoundColumn {
  index: number
  name: string
  tag: TypeTag
}

export interface VertexLayout {
  width: number
  idIndex: number
  labelIndex?: number
  properties: BoundColumn[]
}

export interface EdgeLayout {
  width: number
  startIndex: number
  endIndex: number
  typeIndex?: number
  properties: BoundColumn[]
}

/**
 * Parse a type tag, case-insensitively. Returns undefined for unknown tags.
 */
export function parseTag(raw: string): TypeTag | undefined {
  const lowered = raw.toLowerCase()
  const isArray = lowered.endsWith('[]')
  const scalar = TAG_ALIASES.get(isArray ? lowered.slice(0, -2) : lowered)
  if (scalar === undefined) return undefined
  return isArray ? `${scalar}[]` : scalar
}

function propertyColumn(name: string, tag: TypeTag, table: TableKind, text: string): HeaderColumn {
  if (name === RESERVED_PROPERTY_KEY) {
    throw new MalformedHeaderError(`property column '${name}' is reserved`, table, text)
  }
  return { kind: 'property', name, tag }
}

/**
 * Parse one header cell. A property column without a tag is a string column.
 * @throws MalformedHeaderError
 */
export function parseColumn(text: string, table: TableKind): HeaderColumn {
  switch (text) {
    case ID_COLUMN:
      return { kind: 'id' }
    case START_ID_COLUMN:
      return { kind: 'start' }
    case END_ID_COLUMN:
      return { kind: 'end' }
    case TYPE_COLUMN:
      return { kind: 'type' }
    case LABEL_COLUMN:
      return { kind: 'label' }
  }

  const separator = text.lastIndexOf(':')
  if (separator === -1) {
    if (text === '') throw new MalformedHeaderError('empty column name', table, text)
    return propertyColumn(text, 'string', table, text)
  }

  const name = text.slice(0, separator)
  const rawTag = text.slice(separator + 1)
  const tag = parseTag(rawTag)

  if (name === LABEL_COLUMN) {
    if (tag !== 'string[]') {
      throw new MalformedHeaderError(`label column must be string[], got '${rawTag}'`, table, text)
    }
    return { kind: 'label' }
  }
  if (name === '') {
    throw new MalformedHeaderError(`unknown structural column '${text}'`, table, text)
  }
  if (tag === undefined) {
    throw new MalformedHeaderError(`unknown type tag '${rawTag}' on column '${name}'`, table, text)
  }
  return propertyColumn(name, tag, table, text)
}

/**
 * Shared header walk: binds structural and property columns to their
 * positions and rejects duplicates and columns the table does not allow.
 */
function bindColumns(
  cells: string[],
  table: TableKind,
  allowed: ReadonlySet<HeaderColumn['kind']>,
): { structural: Map<HeaderColumn['kind'], number>; properties: BoundColumn[] } {
  const structural = new Map<HeaderColumn['kind'], number>()
  const properties: BoundColumn[] = []
  const names = new Set<string>()

  cells.forEach((text, index) => {
    const column = parseColumn(text, table)
    if (!allowed.has(column.kind)) {
      throw new MalformedHeaderError(`column '${text}' is not allowed here`, table, text)
    }
    if (column.kind === 'property') {
      if (names.has(column.name)) {
        throw new MalformedHeaderError(`duplicate property column '${column.name}'`, table, text)
      }
      names.add(column.name)
      properties.push({ index, name: column.name, tag: column.tag })
      return
    }
    if (structural.has(column.kind)) {
      throw new MalformedHeaderError(`duplicate column '${text}'`, table, text)
    }
    structural.set(column.kind, index)
  })

  return { structural, properties }
}

const VERTEX_COLUMNS = new Set<HeaderColumn['kind']>(['id', 'label', 'property'])
const EDGE_COLUMNS = new Set<HeaderColumn['kind']>(['start', 'end', 'type', 'property'])

/**
 * Parse a vertex table header.
 * @throws MalformedHeaderError if `:ID` is missing or a column is invalid
 */
export function parseVertexHeader(cells: string[]): VertexLayout {
  const { structural, properties } = bindColumns(cells, 'vertex', VERTEX_COLUMNS)
  const idIndex = structural.get('id')
  if (idIndex === undefined) {
    throw new MalformedHeaderError(`missing mandatory column '${ID_COLUMN}'`, 'vertex', ID_COLUMN)
  }

  const layout: VertexLayout = { width: cells.length, idIndex, properties }
  const labelIndex = structural.get('label')
  if (labelIndex !== undefined) {
    layout.labelIndex = labelIndex
  }
  return layout
}

/**
 * Parse an edge table header.
 * @throws MalformedHeaderError if `:START_ID` or `:END_ID` is missing or
 * out of order, or a column is invalid
 */
export function parseEdgeHeader(cells: string[]): EdgeLayout {
  const { structural, properties } = bindColumns(cells, 'edge', EDGE_COLUMNS)
  const startIndex = structural.get('start')
  const endIndex = structural.get('end')
  if (startIndex === undefined) {
    throw new MalformedHeaderError(`missing mandatory column '${START_ID_COLUMN}'`, 'edge', START_ID_COLUMN)
  }
  if (endIndex === undefined) {
    throw new MalformedHeaderError(`missing mandatory column '${END_ID_COLUMN}'`, 'edge', END_ID_COLUMN)
  }
  if (endIndex < startIndex) {
    throw new MalformedHeaderError(
      `'${START_ID_COLUMN}' must come before '${END_ID_COLUMN}'`,
      'edge',
      END_ID_COLUMN,
    )
  }

  const layout: EdgeLayout = { width: cells.length, startIndex, endIndex, properties }
  const typeIndex = structural.get('type')
  if (typeIndex !== undefined) {
    layout.typeIndex = typeIndex
  }
  return layout
}

/**
 * True when a row carries any structural column token, i.e. it looks like
 * a header rather than data.
 */
export function looksLikeHeader(cells: string[]): boolean {
  return cells.some((cell) =>
    [ID_COLUMN, START_ID_COLUMN, END_ID_COLUMN].includes(cell),
  )
}
