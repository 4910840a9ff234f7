/**
 * Custom Error Classes
 */

/**
 * Which of the two bulk-load tables an error refers to.
 */
export type TableKind = 'vertex' | 'edge'

/**
 * Base error for all codec errors.
 */
export class CypherCsvError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'CypherCsvError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Unsupported type error.
 * Thrown at encode time when a property value has no type tag.
 */
export class UnsupportedTypeError extends CypherCsvError {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
    public readonly reason: string,
  ) {
    super(`Unsupported value for property '${key}': ${reason}`)
    this.name = 'UnsupportedTypeError'
  }
}

/**
 * Malformed header error.
 * Thrown when a header lacks a structural column, repeats a column or
 * carries an unknown type tag, and when a property key cannot be written
 * as a header column.
 */
export class MalformedHeaderError extends CypherCsvError {
  constructor(
    message: string,
    public readonly table: TableKind,
    public readonly column?: string,
  ) {
    super(`Malformed ${table} header: ${message}`)
    this.name = 'MalformedHeaderError'
  }
}

/**
 * Malformed row error.
 * Thrown when a data row is missing a structural value, has the wrong
 * number of cells or is not valid CSV.
 */
export class MalformedRowError extends CypherCsvError {
  constructor(
    message: string,
    public readonly table: TableKind,
    public readonly row: number,
    public readonly source?: number,
    cause?: Error,
  ) {
    const where = source !== undefined ? ` (input ${source})` : ''
    super(`Malformed ${table} row ${row}${where}: ${message}`, cause)
    this.name = 'MalformedRowError'
  }
}

/**
 * Value decoding error.
 * Thrown when a cell's text does not parse as its column's type tag.
 */
export class ValueDecodingError extends CypherCsvError {
  constructor(
    public readonly table: TableKind,
    public readonly row: number,
    public readonly column: string,
    public readonly tag: string,
    public readonly text: string,
    public readonly source?: number,
  ) {
    const where = source !== undefined ? ` (input ${source})` : ''
    super(`Cannot decode ${table} row ${row}${where}, column '${column}': '${text}' is not a valid ${tag}`)
    this.name = 'ValueDecodingError'
  }
}

/**
 * Invalid options error.
 * Thrown when encode or decode options fail validation.
 */
export class InvalidOptionsError extends CypherCsvError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message)
    this.name = 'InvalidOptionsError'
  }
}
