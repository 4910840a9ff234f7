/**
 * Type Codec Module
 */

export {
  SCALAR_TAGS,
  ID_COLUMN,
  START_ID_COLUMN,
  END_ID_COLUMN,
  LABEL_COLUMN,
  LABEL_HEADER,
  TYPE_COLUMN,
  DEFAULT_ARRAY_DELIMITER,
  RESERVED_PROPERTY_KEY,
  isArrayTag,
  elementTag,
} from './types'
export type {
  ScalarTag,
  ArrayTag,
  TypeTag,
  PropertyColumn,
  VertexTableHeader,
  EdgeTableHeader,
} from './types'

export {
  inferTag,
  scalarTagOf,
  encodeValue,
  encodeScalar,
  formatFloat,
  decodeValue,
  decodeScalar,
  splitArray,
  encodeLabels,
  decodeLabels,
} from './values'
export type { ObservedTag, DecodedCell } from './values'

export { widen, finalizeTag, ColumnInference } from './inference'
export type { ColumnOrder } from './inference'

export {
  formatVertexHeader,
  formatEdgeHeader,
  parseTag,
  parseColumn,
  parseVertexHeader,
  parseEdgeHeader,
  looksLikeHeader,
} from './header'
export type { HeaderColumn, BoundColumn, VertexLayout, EdgeLayout } from './header'

export { writeTable, readTable } from './table'
