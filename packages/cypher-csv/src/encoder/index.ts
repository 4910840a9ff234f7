/**
 * Encoder Module
 */

export { encodeGraph, scanVertices, scanEdges, emitVertices, emitEdges } from './encoder'
export type { EncodedGraph } from './encoder'
