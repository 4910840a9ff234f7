/**
 * Decoder Module
 */

export { decodeGraph, collectTable, decodeEdgeRow, decodeVertexRow } from './decoder'
export type { TableInput, SourcedRow, DecodedVertex, DecodedEdge } from './decoder'
