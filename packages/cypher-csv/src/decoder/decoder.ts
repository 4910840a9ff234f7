/**
 * Graph Decoder
 *
 * Rebuilds a graph from an OpenCypher bulk-load table pair. Edges are
 * applied before vertices, so endpoints referenced only by the edge table
 * still exist (as bare vertices) in the result.
 */

import { looksLikeHeader, parseEdgeHeader, parseVertexHeader } from '../codec/header'
import type { BoundColumn, EdgeLayout, VertexLayout } from '../codec/header'
import { readTable } from '../codec/table'
import { END_ID_COLUMN, ID_COLUMN, START_ID_COLUMN } from '../codec/types'
import { decodeLabels, decodeValue } from '../codec/values'
import { resolveDecodeOptions, type DecodeOptions } from '../config/options'
import { MalformedHeaderError, MalformedRowError, ValueDecodingError, type TableKind } from '../errors'
import { DirectedGraph } from '../graph/graph-store'
import type { DecodedProperties, GraphWriter } from '../graph/types'
import { createLogger } from '../utils/logger'

const logger = createLogger('decoder')

/**
 * One table's text, or several texts that share a header.
 */
export type TableInput = string | readonly string[]

/**
 * A data row with its position for error reporting.
 */
export interface SourcedRow {
  cells: string[]
  /** 1-based data row number within its input */
  row: number
  /** Input index; only set when the table came from several texts */
  source?: number
}

interface CollectedTable {
  header: string[]
  rows: SourcedRow[]
}

export interface DecodedVertex {
  id: string
  properties: DecodedProperties
  labels?: string[]
}

export interface DecodedEdge {
  source: string
  target: string
  properties: DecodedProperties
  type?: string
}

function sameCells(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((cell, index) => cell === b[index])
}

// =============================================================================
// TABLE COLLECTION
// =============================================================================

/**
 * Read every text of a table. The first text supplies the header; later
 * texts may repeat it (skipped) or start directly with data.
 * @throws MalformedHeaderError if the header is missing or a later text
 * carries a different header
 * @throws MalformedRowError on CSV syntax errors
 */
export function collectTable(input: TableInput, table: TableKind): CollectedTable {
  const texts: readonly string[] = typeof input === 'string' ? [input] : input
  const multiple = texts.length > 1

  let header: string[] | undefined
  const rows: SourcedRow[] = []

  for (const [index, text] of texts.entries()) {
    const source = multiple ? index : undefined
    let records = readTable(text, table, source)

    if (header === undefined) {
      header = records[0]
      if (header === undefined) {
        throw new MalformedHeaderError('missing header row', table)
      }
      records = records.slice(1)
    } else {
      const first = records[0]
      if (first !== undefined && sameCells(first, header)) {
        records = records.slice(1)
      } else if (first !== undefined && looksLikeHeader(first)) {
        throw new MalformedHeaderError(`header of input ${index} differs from the first input`, table)
      }
    }

    records.forEach((cells, offset) => {
      const row: SourcedRow = { cells, row: offset + 1 }
      if (source !== undefined) row.source = source
      rows.push(row)
    })
  }

  if (header === undefined) {
    throw new MalformedHeaderError('missing header row', table)
  }
  return { header, rows }
}

// =============================================================================
// ROW DECODING
// =============================================================================

function assertWidth(table: TableKind, row: SourcedRow, width: number): void {
  if (row.cells.length !== width) {
    throw new MalformedRowError(
      `expected ${width} cells, got ${row.cells.length}`,
      table,
      row.row,
      row.source,
    )
  }
}

function requireId(table: TableKind, row: SourcedRow, index: number, column: string): string {
  const id = row.cells[index] ?? ''
  if (id === '') {
    throw new MalformedRowError(`missing value for '${column}'`, table, row.row, row.source)
  }
  return id
}

/**
 * Decode the property cells of a row. Empty cells are omitted.
 * @throws ValueDecodingError
 */
function decodeProperties(
  table: TableKind,
  row: SourcedRow,
  columns: BoundColumn[],
  delimiter: string,
): DecodedProperties {
  const properties: DecodedProperties = {}
  for (const column of columns) {
    const text = row.cells[column.index] ?? ''
    const cell = decodeValue(text, column.tag, delimiter)
    if (!cell.ok) {
      throw new ValueDecodingError(table, row.row, column.name, column.tag, text, row.source)
    }
    if (cell.value !== undefined) {
      properties[column.name] = cell.value
    }
  }
  return properties
}

/**
 * Decode one edge table row.
 * @throws MalformedRowError
 * @throws ValueDecodingError
 */
export function decodeEdgeRow(row: SourcedRow, layout: EdgeLayout, delimiter: string): DecodedEdge {
  assertWidth('edge', row, layout.width)
  const edge: DecodedEdge = {
    source: requireId('edge', row, layout.startIndex, START_ID_COLUMN),
    target: requireId('edge', row, layout.endIndex, END_ID_COLUMN),
    properties: decodeProperties('edge', row, layout.properties, delimiter),
  }
  if (layout.typeIndex !== undefined) {
    const type = row.cells[layout.typeIndex] ?? ''
    if (type !== '') edge.type = type
  }
  return edge
}

/**
 * Decode one vertex table row.
 * @throws MalformedRowError
 * @throws ValueDecodingError
 */
export function decodeVertexRow(row: SourcedRow, layout: VertexLayout, delimiter: string): DecodedVertex {
  assertWidth('vertex', row, layout.width)
  const vertex: DecodedVertex = {
    id: requireId('vertex', row, layout.idIndex, ID_COLUMN),
    properties: decodeProperties('vertex', row, layout.properties, delimiter),
  }
  if (layout.labelIndex !== undefined) {
    const labels = decodeLabels(row.cells[layout.labelIndex] ?? '', delimiter)
    if (labels) vertex.labels = labels
  }
  return vertex
}

// =============================================================================
// ENTRY POINT
// =============================================================================

/**
 * Decode a vertex table and an edge table into a graph.
 *
 * Both headers are validated, and every row is decoded, before the graph
 * is touched; a failing call leaves the target graph unchanged. Edges are
 * then added (creating missing endpoints), followed by the vertices, which
 * are merged into any endpoint already created.
 *
 * @example
 * ```typescript
 * const graph = decodeGraph(
 *   ':ID,name:string,:LABEL:string[]\nalice,Alice,Person;Employee\n',
 *   ':START_ID,:END_ID,since:int\nalice,bob,2020\n',
 * )
 * graph.getVertex('bob') // { id: 'bob', properties: {} }
 * ```
 *
 * @throws MalformedHeaderError if a header is missing a structural column,
 * repeats a column or carries an unknown type tag
 * @throws MalformedRowError if a row has the wrong width or lacks an id
 * @throws ValueDecodingError if a cell does not parse as its column's tag
 * @throws InvalidOptionsError if options fail validation
 */
export function decodeGraph(
  vertexTables: TableInput,
  edgeTables: TableInput,
  options?: Omit<DecodeOptions, 'into'>,
): DirectedGraph
export function decodeGraph<G extends GraphWriter>(
  vertexTables: TableInput,
  edgeTables: TableInput,
  options: DecodeOptions & { into: G },
): G
export function decodeGraph(
  vertexTables: TableInput,
  edgeTables: TableInput,
  options?: DecodeOptions,
): GraphWriter {
  const { arrayDelimiter, into } = resolveDecodeOptions(options)

  const edgeTable = collectTable(edgeTables, 'edge')
  const edgeLayout = parseEdgeHeader(edgeTable.header)
  const vertexTable = collectTable(vertexTables, 'vertex')
  const vertexLayout = parseVertexHeader(vertexTable.header)

  const edges = edgeTable.rows.map((row) => decodeEdgeRow(row, edgeLayout, arrayDelimiter))
  const vertices = vertexTable.rows.map((row) => decodeVertexRow(row, vertexLayout, arrayDelimiter))

  const graph = into ?? new DirectedGraph()

  for (const edge of edges) {
    graph.addEdge(edge.source, edge.target, edge.properties, edge.type)
  }

  const listed = new Set<string>()
  for (const vertex of vertices) {
    if (listed.has(vertex.id)) {
      logger.debug('Merging duplicate vertex row', { id: vertex.id })
    }
    listed.add(vertex.id)
    graph.addVertex(vertex.id, vertex.properties, vertex.labels)
  }

  const implicit = new Set<string>()
  for (const edge of edges) {
    if (!listed.has(edge.source)) implicit.add(edge.source)
    if (!listed.has(edge.target)) implicit.add(edge.target)
  }
  logger.debug('Decoded graph', {
    vertices: vertices.length,
    edges: edges.length,
    implicitVertices: implicit.size,
  })

  return graph
}
