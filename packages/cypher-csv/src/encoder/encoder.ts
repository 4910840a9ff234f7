/**
 * Graph Encoder
 *
 * Converts a graph into an OpenCypher bulk-load table pair. Each table is
 * built in two separate phases: a scan that settles the header, then the
 * emission of rows against that finished header.
 */

import { ColumnInference } from '../codec/inference'
import { formatEdgeHeader, formatVertexHeader } from '../codec/header'
import { writeTable } from '../codec/table'
import {
  END_ID_COLUMN,
  ID_COLUMN,
  START_ID_COLUMN,
  type EdgeTableHeader,
  type PropertyColumn,
  type VertexTableHeader,
} from '../codec/types'
import { encodeLabels, encodeValue } from '../codec/values'
import { resolveEncodeOptions, type EncodeOptions, type ResolvedEncodeOptions } from '../config/options'
import { UnsupportedTypeError } from '../errors'
import type { EdgeRecord, GraphReader, PropertyMap, VertexId, VertexRecord } from '../graph/types'
import { createLogger } from '../utils/logger'

const logger = createLogger('encoder')

/**
 * The two tables of a bulk-load import.
 */
export interface EncodedGraph {
  /** Vertex table (`:ID`, properties, `:LABEL`) */
  vertices: string
  /** Edge table (`:START_ID`, `:END_ID`, `:TYPE`, properties) */
  edges: string
}

// =============================================================================
// SCAN PHASE
// =============================================================================

/**
 * Settle the vertex table header from every vertex.
 * @throws UnsupportedTypeError
 * @throws MalformedHeaderError
 */
export function scanVertices(
  vertices: Iterable<VertexRecord>,
  options: Pick<ResolvedEncodeOptions, 'columnOrder' | 'defaultVertexLabel'>,
): VertexTableHeader {
  const inference = new ColumnInference('vertex', logger)
  let hasLabels = options.defaultVertexLabel !== undefined

  for (const vertex of vertices) {
    inference.observe(vertex.properties)
    if (vertex.labels && vertex.labels.length > 0) hasLabels = true
  }

  return { properties: inference.columns(options.columnOrder), hasLabels }
}

/**
 * Settle the edge table header from every edge.
 * @throws UnsupportedTypeError
 * @throws MalformedHeaderError
 */
export function scanEdges(
  edges: Iterable<EdgeRecord>,
  options: Pick<ResolvedEncodeOptions, 'columnOrder' | 'defaultEdgeType'>,
): EdgeTableHeader {
  const inference = new ColumnInference('edge', logger)
  let hasType = options.defaultEdgeType !== undefined

  for (const edge of edges) {
    inference.observe(edge.properties)
    if (edge.type !== undefined) hasType = true
  }

  return { properties: inference.columns(options.columnOrder), hasType }
}

// =============================================================================
// EMIT PHASE
// =============================================================================

function encodeId(column: string, id: VertexId): string {
  const text = String(id)
  if (text === '') {
    throw new UnsupportedTypeError(column, id, 'identifiers must not be empty')
  }
  return text
}

/**
 * Render a record's cells in column order. Only own keys count, so a column
 * named like an `Object.prototype` member reads as absent on records
 * without it.
 */
function encodeProperties(properties: PropertyMap, columns: PropertyColumn[], delimiter: string): string[] {
  return columns.map((column) => {
    const value = Object.hasOwn(properties, column.name) ? properties[column.name] : undefined
    return encodeValue(column.name, value, column.tag, delimiter)
  })
}

/**
 * Render the vertex table against a finished header.
 * @throws UnsupportedTypeError
 */
export function emitVertices(
  vertices: Iterable<VertexRecord>,
  header: VertexTableHeader,
  options: Pick<ResolvedEncodeOptions, 'arrayDelimiter' | 'defaultVertexLabel'>,
): string {
  const rows: string[][] = []
  for (const vertex of vertices) {
    const row = [
      encodeId(ID_COLUMN, vertex.id),
      ...encodeProperties(vertex.properties, header.properties, options.arrayDelimiter),
    ]
    if (header.hasLabels) {
      const labels =
        vertex.labels && vertex.labels.length > 0
          ? vertex.labels
          : options.defaultVertexLabel !== undefined
            ? [options.defaultVertexLabel]
            : undefined
      row.push(encodeLabels(labels, options.arrayDelimiter))
    }
    rows.push(row)
  }
  return writeTable(formatVertexHeader(header), rows)
}

/**
 * Render the edge table against a finished header.
 * @throws UnsupportedTypeError
 */
export function emitEdges(
  edges: Iterable<EdgeRecord>,
  header: EdgeTableHeader,
  options: Pick<ResolvedEncodeOptions, 'arrayDelimiter' | 'defaultEdgeType'>,
): string {
  const rows: string[][] = []
  for (const edge of edges) {
    const row = [encodeId(START_ID_COLUMN, edge.source), encodeId(END_ID_COLUMN, edge.target)]
    if (header.hasType) {
      row.push(edge.type ?? options.defaultEdgeType ?? '')
    }
    row.push(...encodeProperties(edge.properties, header.properties, options.arrayDelimiter))
    rows.push(row)
  }
  return writeTable(formatEdgeHeader(header), rows)
}

// =============================================================================
// ENTRY POINT
// =============================================================================

/**
 * Encode a graph as a vertex table and an edge table.
 *
 * The graph is only read. Column order follows first appearance of each
 * property key (or name order with `columnOrder: 'sorted'`); row order
 * follows the graph's iteration order.
 *
 * @example
 * ```typescript
 * const graph = new DirectedGraph()
 * graph.addVertex(1, { name: 'Alice', age: 30 })
 * graph.addVertex(2, { name: 'Bob' })
 * graph.addEdge(1, 2, { since: 2020 })
 *
 * const { vertices, edges } = encodeGraph(graph)
 * // vertices: ':ID,name:string,age:int\n1,Alice,30\n2,Bob,\n'
 * // edges:    ':START_ID,:END_ID,since:int\n1,2,2020\n'
 * ```
 *
 * @throws UnsupportedTypeError if a value cannot be typed
 * @throws MalformedHeaderError if a property key cannot be a column
 * @throws InvalidOptionsError if options fail validation
 */
export function encodeGraph(graph: GraphReader, options?: EncodeOptions): EncodedGraph {
  const resolved = resolveEncodeOptions(options)

  const vertexHeader = scanVertices(graph.vertices(), resolved)
  const vertices = emitVertices(graph.vertices(), vertexHeader, resolved)

  const edgeHeader = scanEdges(graph.edges(), resolved)
  const edges = emitEdges(graph.edges(), edgeHeader, resolved)

  logger.debug('Encoded graph', {
    vertexColumns: vertexHeader.properties.length,
    edgeColumns: edgeHeader.properties.length,
  })
  return { vertices, edges }
}
