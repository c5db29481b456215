/**
 * Shard Loader
 *
 * Reads one shard into memory, parses its event dates, tags every row
 * with the file it came from, and hands the result to the normalizer.
 *
 * @module shards/load
 */

import { promises as fs } from 'node:fs'
import { basename } from 'node:path'
import { parse } from 'csv-parse/sync'
import { EVENT_DATE_COLUMN, PROVENANCE_COLUMN } from '../constants'
import { ErrorCode, ParseError, StorageError, ValidationError, toError } from '../errors'
import { parseEventDate } from '../schema/date'
import { normalizeTable, type RawTable } from '../schema/normalize'
import type { EventTable, SchemaOptions } from '../types'

/**
 * Parse CSV text into a raw table
 *
 * @param source - Name reported in errors and recorded as provenance
 * @throws ParseError if the text is not valid delimited data
 * @throws ValidationError if `event_date` is missing or holds an invalid date
 */
export function parseShard(text: string, source: string): RawTable {
  let headers: string[] = []
  let records: Record<string, string>[]
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      columns: (header: string[]) => {
        headers = header.map(h => h.trim())
        return headers
      },
    })
  } catch (error) {
    throw new ParseError(source, toError(error))
  }

  if (!headers.includes(EVENT_DATE_COLUMN)) {
    throw new ValidationError(
      `Missing expected columns: ${EVENT_DATE_COLUMN}`,
      ErrorCode.SCHEMA_MISMATCH,
      { columns: [EVENT_DATE_COLUMN], sources: [source] }
    )
  }

  const rows = records.map((record, i) => {
    const raw = record[EVENT_DATE_COLUMN] ?? ''
    const date = parseEventDate(raw)
    if (date === undefined) {
      // +2: header line, and rows are 1-based
      throw new ValidationError(
        `Invalid ${EVENT_DATE_COLUMN} "${raw}" in ${source} at row ${i + 2}`,
        ErrorCode.INVALID_DATE,
        { file: source, row: i + 2, value: raw }
      )
    }
    return { ...record, [EVENT_DATE_COLUMN]: date, [PROVENANCE_COLUMN]: source }
  })

  const columns = headers.includes(PROVENANCE_COLUMN) ? headers : [...headers, PROVENANCE_COLUMN]
  return { columns, rows, sources: [source] }
}

/**
 * Load and normalize a single shard file
 */
export async function loadShard(path: string, options: SchemaOptions = {}): Promise<EventTable> {
  const name = basename(path)
  let text: string
  try {
    text = await fs.readFile(path, 'utf-8')
  } catch (error) {
    throw new StorageError(
      `Failed to read ${name}: ${toError(error).message}`,
      ErrorCode.STORAGE_READ_ERROR,
      { path },
      toError(error)
    )
  }

  return normalizeTable(parseShard(text, name), options)
}
