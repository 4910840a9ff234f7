/**
 * Type Codec Types
 *
 * The closed type-tag vocabulary shared by the encoder and decoder.
 */

export const SCALAR_TAGS = ['int', 'float', 'string', 'boolean'] as const

export type ScalarTag = (typeof SCALAR_TAGS)[number]

export type ArrayTag = `${ScalarTag}[]`

/**
 * Declared decoding rule of a column.
 */
export type TypeTag = ScalarTag | ArrayTag

/**
 * Structural column names of the bulk-load convention.
 */
export const ID_COLUMN = ':ID'
export const START_ID_COLUMN = ':START_ID'
export const END_ID_COLUMN = ':END_ID'
export const LABEL_COLUMN = ':LABEL'
export const TYPE_COLUMN = ':TYPE'

/** Header text of the label column as written by the encoder */
export const LABEL_HEADER = `${LABEL_COLUMN}:string[]`

export const DEFAULT_ARRAY_DELIMITER = ';'

/** Cannot be a decoded property name: assigning it replaces an object's prototype */
export const RESERVED_PROPERTY_KEY = '__proto__'

/**
 * A typed property column.
 */
export interface PropertyColumn {
  name: string
  tag: TypeTag
}

/**
 * Finalized vertex table layout. Column order is `:ID`, properties, `:LABEL`.
 */
export interface VertexTableHeader {
  properties: PropertyColumn[]
  hasLabels: boolean
}

/**
 * Finalized edge table layout. Column order is `:START_ID`, `:END_ID`,
 * `:TYPE`, properties.
 */
export interface EdgeTableHeader {
  properties: PropertyColumn[]
  hasType: boolean
}

/**
 * Check whether a tag is an array tag.
 */
export function isArrayTag(tag: TypeTag): tag is ArrayTag {
  return tag.endsWith('[]')
}

/**
 * Element tag of an array tag, or the tag itself for scalars.
 */
export function elementTag(tag: TypeTag): ScalarTag {
  switch (tag) {
    case 'int':
    case 'int[]':
      return 'int'
    case 'float':
    case 'float[]':
      return 'float'
    case 'boolean':
    case 'boolean[]':
      return 'boolean'
    case 'string':
    case 'string[]':
      return 'string'
  }
}
