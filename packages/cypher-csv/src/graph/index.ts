/**
 * Graph Module
 */

export { DirectedGraph, isImplicitVertex, isArrayValue } from './graph-store'
export type { DirectedGraphOptions } from './graph-store'
export type {
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
} from './types'
