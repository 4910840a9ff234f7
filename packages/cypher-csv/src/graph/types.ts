/**
 * Graph Model Types
 *
 * The capability interfaces the codec reads from and writes to.
 */

/**
 * Vertex identifier. Rendered with `String(id)` when encoded; decoded
 * graphs always use string ids.
 */
export type VertexId = string | number

/**
 * A single typed property value.
 */
export type ScalarValue = string | number | bigint | boolean

/**
 * A property value: a scalar or a homogeneous ordered sequence of scalars.
 */
export type PropertyValue = ScalarValue | readonly ScalarValue[]

/**
 * Property mapping as supplied by callers. `null` and `undefined` entries
 * are treated as absent.
 */
export type PropertyMap = Readonly<Record<string, PropertyValue | null | undefined>>

/**
 * Property mapping as produced by the decoder. Absent values are omitted.
 */
export type DecodedProperties = Record<string, PropertyValue>

/**
 * A vertex as seen by the codec.
 */
export interface VertexRecord {
  id: VertexId
  properties: PropertyMap
  /** Ordered labels. Absent rather than empty when the vertex has none. */
  labels?: readonly string[]
}

/**
 * A directed edge as seen by the codec.
 */
export interface EdgeRecord {
  source: VertexId
  target: VertexId
  properties: PropertyMap
  /** Relationship type */
  type?: string
}

/**
 * Read capability used by the encoder. Each call must start a fresh
 * iteration: the encoder walks vertices and edges twice.
 */
export interface GraphReader {
  vertices(): Iterable<VertexRecord>
  edges(): Iterable<EdgeRecord>
}

/**
 * Write capability used by the decoder.
 */
export interface GraphWriter {
  /**
   * Insert or update a vertex. Properties are merged into any existing
   * vertex; labels replace existing labels when given.
   */
  addVertex(id: string, properties: DecodedProperties, labels?: readonly string[]): void

  /**
   * Add an edge, creating either endpoint (with no properties and no labels)
   * if it does not exist yet.
   */
  addEdge(source: string, target: string, properties: DecodedProperties, type?: string): void
}

/**
 * A graph that can be both encoded and decoded into.
 */
export type PropertyGraph = GraphReader & GraphWriter
