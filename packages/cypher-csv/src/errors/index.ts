/**
 * Errors Module
 */

export {
  CypherCsvError,
  UnsupportedTypeError,
  MalformedHeaderError,
  MalformedRowError,
  ValueDecodingError,
  InvalidOptionsError,
} from './errors'
export type { TableKind } from './errors'
