/**
 * cypher-csv - OpenCypher Bulk-Load CSV Codec
 *
 * Converts an in-memory directed property graph into the vertex/edge CSV
 * table pair used by Cypher bulk importers, and back.
 *
 * @example
 * ```typescript
 * import { DirectedGraph, encodeGraph, decodeGraph } from 'cypher-csv';
 *
 * const graph = new DirectedGraph();
 * graph.addVertex('alice', { name: 'Alice', age: 30 }, ['Person', 'Employee']);
 * graph.addVertex('bob', { name: 'Bob', scores: [1.5, 2] });
 * graph.addEdge('alice', 'bob', { since: 2020 }, 'KNOWS');
 *
 * const { vertices, edges } = encodeGraph(graph);
 * // vertices:
 * //   :ID,name:string,age:int,scores:float[],:LABEL:string[]
 * //   alice,Alice,30,,Person;Employee
 * //   bob,Bob,,1.5;2.0,
 * // edges:
 * //   :START_ID,:END_ID,:TYPE,since:int
 * //   alice,bob,KNOWS,2020
 *
 * const copy = decodeGraph(vertices, edges);
 * copy.getVertex('alice'); // { id: 'alice', properties: { name: 'Alice', age: 30 }, labels: [...] }
 *
 * // Several files per table, decoded into an existing graph
 * decodeGraph([people, places], [visits], { into: copy });
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// ENCODER / DECODER
// =============================================================================

export { encodeGraph } from './encoder'
export type { EncodedGraph } from './encoder'

export { decodeGraph } from './decoder'
export type { TableInput } from './decoder'

// =============================================================================
// GRAPH
// =============================================================================

export { DirectedGraph, isImplicitVertex } from './graph'
export type {
  DirectedGraphOptions,
  VertexId,
  ScalarValue,
  PropertyValue,
  PropertyMap,
  DecodedProperties,
  VertexRecord,
  EdgeRecord,
  GraphReader,
  GraphWriter,
  PropertyGraph,
} from './graph'

// =============================================================================
// TYPE CODEC (for advanced use cases)
// =============================================================================

export {
  inferTag,
  encodeValue,
  decodeValue,
  encodeLabels,
  decodeLabels,
  widen,
  parseTag,
  DEFAULT_ARRAY_DELIMITER,
} from './codec'
export type { ScalarTag, ArrayTag, TypeTag, PropertyColumn, ColumnOrder } from './codec'

// =============================================================================
// CONFIGURATION
// =============================================================================

export { EncodeOptionsSchema, DecodeOptionsSchema } from './config'
export type { EncodeOptions, DecodeOptions } from './config'

// =============================================================================
// ERRORS
// =============================================================================

export {
  CypherCsvError,
  UnsupportedTypeError,
  MalformedHeaderError,
  MalformedRowError,
  ValueDecodingError,
  InvalidOptionsError,
} from './errors'
export type { TableKind } from './errors'

// =============================================================================
// LOGGING
// =============================================================================

export { configureLogger, resetLogger } from './utils'
export type { LoggerConfig, LogLevel, LogContext } from './utils'
