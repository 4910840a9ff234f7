/**
 * Codec Options
 *
 * Runtime validation of encode/decode options using Zod, with defaults.
 */

import { z } from 'zod'
import { DEFAULT_ARRAY_DELIMITER } from '../codec/types'
import { InvalidOptionsError } from '../errors'
import type { GraphWriter } from '../graph/types'

/** Characters the CSV layer already uses */
const RESERVED_DELIMITERS = [',', '"', '\r', '\n']

const ArrayDelimiterSchema = z
  .string()
  .length(1, 'must be a single character')
  .refine((value) => !RESERVED_DELIMITERS.includes(value), 'must not be a comma, quote or line break')

function isGraphWriter(value: unknown): value is GraphWriter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'addVertex' in value &&
    typeof value.addVertex === 'function' &&
    'addEdge' in value &&
    typeof value.addEdge === 'function'
  )
}

export const EncodeOptionsSchema = z
  .object({
    /** Inner delimiter of array cells and the label cell */
    arrayDelimiter: ArrayDelimiterSchema.default(DEFAULT_ARRAY_DELIMITER),
    /** Property column order: first-seen across records, or by name */
    columnOrder: z.enum(['first-seen', 'sorted']).default('first-seen'),
    /** Label written for vertices without labels; forces the label column */
    defaultVertexLabel: z.string().min(1).optional(),
    /** Type written for edges without a type; forces the type column */
    defaultEdgeType: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.defaultVertexLabel?.includes(options.arrayDelimiter)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultVertexLabel'],
        message: 'must not contain the array delimiter',
      })
    }
  })

export const DecodeOptionsSchema = z
  .object({
    /** Inner delimiter of array cells and the label cell */
    arrayDelimiter: ArrayDelimiterSchema.default(DEFAULT_ARRAY_DELIMITER),
    /** Graph to decode into instead of a fresh DirectedGraph */
    into: z.custom<GraphWriter>(isGraphWriter, 'must implement addVertex and addEdge').optional(),
  })
  .strict()

export type EncodeOptions = z.input<typeof EncodeOptionsSchema>
export type ResolvedEncodeOptions = z.output<typeof EncodeOptionsSchema>
export type DecodeOptions = z.input<typeof DecodeOptionsSchema>
export type ResolvedDecodeOptions = z.output<typeof DecodeOptionsSchema>

function resolve<S extends z.ZodTypeAny>(schema: S, input: unknown, kind: string): z.output<S> {
  const result = schema.safeParse(input ?? {})
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    throw new InvalidOptionsError(`Invalid ${kind} options: ${issues.join('; ')}`, issues)
  }
  return result.data
}

/**
 * Validate encode options and fill in defaults.
 * @throws InvalidOptionsError
 */
export function resolveEncodeOptions(options?: EncodeOptions): ResolvedEncodeOptions {
  return resolve(EncodeOptionsSchema, options, 'encode')
}

/**
 * Validate decode options and fill in defaults.
 * @throws InvalidOptionsError
 */
export function resolveDecodeOptions(options?: DecodeOptions): ResolvedDecodeOptions {
  return resolve(DecodeOptionsSchema, options, 'decode')
}
