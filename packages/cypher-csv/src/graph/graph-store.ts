/**
 * In-Memory Directed Graph
 *
 * Default graph the decoder builds into. Stores vertices and edges in
 * insertion order with adjacency lists for traversal.
 */

import type {
  EdgeRecord,
  PropertyGraph,
  PropertyMap,
  PropertyValue,
  ScalarValue,
  VertexId,
  VertexRecord,
} from './types'

/**
 * Stored vertex. Properties never hold null or undefined.
 */
interface StoredVertex {
  id: VertexId
  properties: Record<string, PropertyValue>
  labels?: string[]
}

/**
 * Stored edge. `index` is the edge's position in insertion order.
 */
interface StoredEdge {
  index: number
  source: VertexId
  target: VertexId
  properties: Record<string, PropertyValue>
  type?: string
}

export interface DirectedGraphOptions {
  /**
   * Keep parallel edges between the same ordered pair (default: true).
   * When false, adding an edge for an existing pair merges into it.
   */
  multigraph?: boolean
}

/**
 * Check whether a property value is an array value.
 */
export function isArrayValue(value: PropertyValue): value is readonly ScalarValue[] {
  return Array.isArray(value)
}

/**
 * Define an own property. Plain assignment of `__proto__` would replace the
 * prototype instead.
 */
function setProperty(target: Record<string, PropertyValue>, key: string, value: PropertyValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * Copy present entries of a property map into `target`.
 */
function mergeProperties(target: Record<string, PropertyValue>, properties: PropertyMap): void {
  for (const [key, value] of Object.entries(properties)) {
    if (value === null || value === undefined) continue
    setProperty(target, key, isArrayValue(value) ? [...value] : value)
  }
}

/**
 * Copy a property map, dropping absent entries.
 */
function copyProperties(properties: PropertyMap): Record<string, PropertyValue> {
  const result: Record<string, PropertyValue> = {}
  mergeProperties(result, properties)
  return result
}

function toVertexRecord(vertex: StoredVertex): VertexRecord {
  const record: VertexRecord = { id: vertex.id, properties: copyProperties(vertex.properties) }
  if (vertex.labels) {
    record.labels = [...vertex.labels]
  }
  return record
}

function toEdgeRecord(edge: StoredEdge): EdgeRecord {
  const record: EdgeRecord = {
    source: edge.source,
    target: edge.target,
    properties: copyProperties(edge.properties),
  }
  if (edge.type !== undefined) {
    record.type = edge.type
  }
  return record
}

/**
 * True when a vertex carries no properties and no labels, i.e. it exists
 * only because an edge referenced it.
 */
export function isImplicitVertex(vertex: VertexRecord): boolean {
  const hasProperties = Object.values(vertex.properties).some((v) => v !== null && v !== undefined)
  return !hasProperties && (vertex.labels === undefined || vertex.labels.length === 0)
}

/**
 * In-memory directed property graph with support for:
 * - Vertex upsert with property merging
 * - Edge insertion with implicit endpoint creation
 * - Multigraph or simple-graph edge semantics
 * - Outgoing/incoming adjacency lookup
 */
export class DirectedGraph implements PropertyGraph {
  /** All vertices by ID, in insertion order */
  private vertexMap = new Map<VertexId, StoredVertex>()

  /** All edges in insertion order */
  private edgeList: StoredEdge[] = []

  /** Outgoing edges per vertex: vertexId -> edge indexes */
  private outEdges = new Map<VertexId, number[]>()

  /** Incoming edges per vertex: vertexId -> edge indexes */
  private inEdges = new Map<VertexId, number[]>()

  private readonly multigraph: boolean

  constructor(options: DirectedGraphOptions = {}) {
    this.multigraph = options.multigraph ?? true
  }

  // ===========================================================================
  // VERTEX OPERATIONS
  // ===========================================================================

  /**
   * Insert a vertex or merge into an existing one.
   * An empty label list clears the vertex's labels.
   */
  addVertex(id: VertexId, properties: PropertyMap = {}, labels?: readonly string[]): void {
    const vertex = this.ensureVertex(id)
    mergeProperties(vertex.properties, properties)

    if (labels === undefined) return
    if (labels.length > 0) {
      vertex.labels = [...labels]
    } else {
      delete vertex.labels
    }
  }

  /**
   * Get a vertex by ID.
   */
  getVertex(id: VertexId): VertexRecord | undefined {
    const vertex = this.vertexMap.get(id)
    return vertex ? toVertexRecord(vertex) : undefined
  }

  /**
   * Check if a vertex exists.
   */
  hasVertex(id: VertexId): boolean {
    return this.vertexMap.has(id)
  }

  /**
   * Iterate all vertices in insertion order.
   */
  *vertices(): IterableIterator<VertexRecord> {
    for (const vertex of this.vertexMap.values()) {
      yield toVertexRecord(vertex)
    }
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Add an edge, creating missing endpoints.
   */
  addEdge(source: VertexId, target: VertexId, properties: PropertyMap = {}, type?: string): void {
    this.ensureVertex(source)
    this.ensureVertex(target)

    if (!this.multigraph) {
      const existing = this.findEdge(source, target)
      if (existing) {
        mergeProperties(existing.properties, properties)
        if (type !== undefined) existing.type = type
        return
      }
    }

    const edge: StoredEdge = {
      index: this.edgeList.length,
      source,
      target,
      properties: copyProperties(properties),
    }
    if (type !== undefined) {
      edge.type = type
    }
    this.edgeList.push(edge)
    this.outEdges.get(source)?.push(edge.index)
    this.inEdges.get(target)?.push(edge.index)
  }

  /**
   * Iterate all edges in insertion order.
   */
  *edges(): IterableIterator<EdgeRecord> {
    for (const edge of this.edgeList) {
      yield toEdgeRecord(edge)
    }
  }

  /**
   * Get outgoing edges from a vertex.
   */
  outgoing(id: VertexId): EdgeRecord[] {
    return this.collect(this.outEdges.get(id))
  }

  /**
   * Get incoming edges to a vertex.
   */
  incoming(id: VertexId): EdgeRecord[] {
    return this.collect(this.inEdges.get(id))
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Get graph statistics.
   */
  stats(): { vertices: number; edges: number } {
    return {
      vertices: this.vertexMap.size,
      edges: this.edgeList.length,
    }
  }

  /**
   * Clear all data.
   */
  clear(): void {
    this.vertexMap.clear()
    this.edgeList = []
    this.outEdges.clear()
    this.inEdges.clear()
  }

  private ensureVertex(id: VertexId): StoredVertex {
    const existing = this.vertexMap.get(id)
    if (existing) return existing

    const vertex: StoredVertex = { id, properties: {} }
    this.vertexMap.set(id, vertex)
    this.outEdges.set(id, [])
    this.inEdges.set(id, [])
    return vertex
  }

  private findEdge(source: VertexId, target: VertexId): StoredEdge | undefined {
    for (const index of this.outEdges.get(source) ?? []) {
      const edge = this.edgeList[index]
      if (edge && edge.target === target) return edge
    }
    return undefined
  }

  private collect(indexes: number[] | undefined): EdgeRecord[] {
    if (!indexes) return []
    return indexes
      .map((index) => this.edgeList[index])
      .filter((e): e is StoredEdge => e !== undefined)
      .map(toEdgeRecord)
  }
}
