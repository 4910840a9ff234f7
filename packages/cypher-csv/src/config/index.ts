/**
 * Configuration Module
 */

export {
  EncodeOptionsSchema,
  DecodeOptionsSchema,
  resolveEncodeOptions,
  resolveDecodeOptions,
} from './options'
export type { EncodeOptions, ResolvedEncodeOptions, DecodeOptions, ResolvedDecodeOptions } from './options'
