// ============================================================================
// Delimited text parser (CSV / TSV)
//
// RFC 4180 quoting through csv-parse. Records may differ in length; the
// table reports arity mismatches itself.
// ============================================================================

import { CsvError } from 'csv-parse'
import { parse } from 'csv-parse/sync'

export class DelimitedParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(message)
    this.name = 'DelimitedParseError'
  }
}

/** Splits delimited text into records of fields. */
export function parseDelimited(input: string, delimiter = ','): string[][] {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new DelimitedParseError(`Invalid delimiter: ${JSON.stringify(delimiter)}`, 1)
  }

  try {
    const records: string[][] = parse(input, {
      delimiter,
      relax_column_count: true,
    })
    return records
  } catch (err) {
    if (err instanceof CsvError) {
      const line = typeof err.lines === 'number' ? err.lines : 1
      throw new DelimitedParseError(err.message, line)
    }
    throw err
  }
}
