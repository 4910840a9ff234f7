/**
 * Table I/O
 *
 * Row-level CSV reading and writing. Cells are quoted by csv-writer when
 * they contain a comma, a double quote or a line feed (every cell, when the
 * table holds a carriage return), and unquoted by csv-parse on the way back.
 */

import { CsvError } from 'csv-parse'
import { parse } from 'csv-parse/sync'
import { createArrayCsvStringifier } from 'csv-writer'
import { MalformedRowError, type TableKind } from '../errors'

const RECORD_DELIMITER = '\n'

/**
 * csv-writer only quotes on comma, quote and LF. An unquoted CR would be
 * read back as a record break, so a table holding one is written fully
 * quoted.
 */
function hasCarriageReturn(header: string[], rows: string[][]): boolean {
  const hasCr = (cell: string) => cell.includes('\r')
  return header.some(hasCr) || rows.some((row) => row.some(hasCr))
}

/**
 * Render a header row and data rows. Every row, the header included, ends
 * with a newline.
 */
export function writeTable(header: string[], rows: string[][]): string {
  const stringifier = createArrayCsvStringifier({
    header,
    recordDelimiter: RECORD_DELIMITER,
    alwaysQuote: hasCarriageReturn(header, rows),
  })
  const head = stringifier.getHeaderString() ?? ''
  return rows.length > 0 ? head + stringifier.stringifyRecords(rows) : head
}

function isRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  )
}

/**
 * Parse CSV text into rows of raw cells. Blank lines are skipped and a
 * leading byte order mark is dropped. Rows may differ in length; the
 * decoder checks widths against the header.
 * @throws MalformedRowError on CSV syntax errors
 */
export function readTable(text: string, table: TableKind, source?: number): string[][] {
  let records: unknown
  try {
    records = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true })
  } catch (error) {
    if (error instanceof CsvError) {
      // `records` counts the rows parsed before the failure, header included
      const parsed: unknown = error.records
      const row = typeof parsed === 'number' ? parsed : 0
      throw new MalformedRowError(`invalid CSV (${error.code})`, table, row, source, error)
    }
    throw error
  }

  if (!isRows(records)) {
    throw new MalformedRowError('CSV parser returned non-text cells', table, 0, source)
  }
  return records
}
