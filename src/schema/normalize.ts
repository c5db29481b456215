/**
 * Schema Normalizer
 *
 * Brings a freshly loaded shard to the fixed output schema: derives
 * `iso3` for old exports that only carry the numeric code, checks that
 * every retained column exists, and projects rows to the canonical
 * column order.
 *
 * @module schema/normalize
 */

import { resolveSchemaOptions } from '../config'
import { ISO3_COLUMN, ISO_COLUMN } from '../constants'
import { ErrorCode, ValidationError } from '../errors'
import type { EventRecord, EventTable, SchemaOptions } from '../types'
import { parseIsoCode } from './iso'

/**
 * A table as read from disk, before schema enforcement
 */
export interface RawTable {
  columns: readonly string[]
  rows: Record<string, string>[]
  sources: readonly string[]
}

/**
 * Enforce the retained-column schema on a loaded table
 *
 * @throws ValidationError if numeric ISO codes cannot be mapped or columns are missing
 */
export function normalizeTable(table: RawTable, options: SchemaOptions = {}): EventTable {
  const { retainedColumns, isoMap } = resolveSchemaOptions(options)
  let columns = table.columns
  let rows = table.rows

  if (!columns.includes(ISO3_COLUMN) && columns.includes(ISO_COLUMN)) {
    const unmapped = new Set<string>()
    const iso3ByRow = rows.map(row => {
      const raw = row[ISO_COLUMN] ?? ''
      const code = parseIsoCode(raw)
      const iso3 = code === undefined ? undefined : isoMap.get(code)
      if (iso3 === undefined) {
        unmapped.add(code === undefined ? raw.trim() : String(code))
        return ''
      }
      return iso3
    })

    if (unmapped.size > 0) {
      const codes = [...unmapped].sort(compareCodes)
      throw new ValidationError(
        `The following numerical ISO codes could not be mapped to a three-letter equivalent: ${codes.join(', ')}`,
        ErrorCode.UNMAPPED_ISO_CODE,
        { codes, sources: table.sources }
      )
    }

    rows = rows.map((row, i) => ({ ...row, [ISO3_COLUMN]: iso3ByRow[i] ?? '' }))
    columns = [...columns, ISO3_COLUMN]
  }

  const missing = retainedColumns.filter(column => !columns.includes(column))
  if (missing.length > 0) {
    throw new ValidationError(
      `Missing expected columns: ${missing.join(', ')}`,
      ErrorCode.SCHEMA_MISMATCH,
      { columns: missing, sources: table.sources }
    )
  }

  return {
    columns: retainedColumns,
    rows: rows.map(row => project(row, retainedColumns)),
    sources: table.sources,
  }
}

function project(row: Record<string, string>, columns: readonly string[]): EventRecord {
  const values: Record<string, string> = {}
  for (const column of columns) {
    values[column] = row[column] ?? ''
  }
  return {
    ...values,
    event_id_cnty: values.event_id_cnty ?? '',
    event_date: values.event_date ?? '',
    timestamp: values.timestamp ?? '',
  }
}

/**
 * Numeric codes in numeric order, anything unparseable after them
 */
function compareCodes(a: string, b: string): number {
  const na = Number(a)
  const nb = Number(b)
  const aNumeric = a !== '' && Number.isFinite(na)
  const bNumeric = b !== '' && Number.isFinite(nb)
  if (aNumeric && bNumeric) return na - nb
  if (aNumeric) return -1
  if (bNumeric) return 1
  return a < b ? -1 : a > b ? 1 : 0
}
