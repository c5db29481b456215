/**
 * Test Data Factories
 *
 * Factory functions for building shards and tables against a reduced
 * schema, so tests only spell out the columns they care about.
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { EventRecord, EventTable, IsoMap } from '../src/types'

// =============================================================================
// Schema
// =============================================================================

/**
 * Reduced retained-column list used throughout the tests
 */
export const TEST_RETAINED_COLUMNS: readonly string[] = [
  'event_id_cnty', 'timestamp', 'event_date', 'iso', 'iso3', '_orig_fname',
]

export const TEST_ISO_MAP: IsoMap = new Map([
  [123, 'ABC'],
  [456, 'XYZ'],
])

export const TEST_SCHEMA = {
  retainedColumns: TEST_RETAINED_COLUMNS,
  isoMap: TEST_ISO_MAP,
}

// =============================================================================
// Records and Tables
// =============================================================================

export interface RecordInput {
  event_id_cnty: string
  event_date?: string
  timestamp?: string
  iso?: string
  iso3?: string
  _orig_fname?: string
}

/**
 * Create an event record with test defaults
 */
export function createRecord(input: RecordInput): EventRecord {
  return {
    event_id_cnty: input.event_id_cnty,
    timestamp: input.timestamp ?? '1',
    event_date: input.event_date ?? '2020-01-01',
    iso: input.iso ?? '123',
    iso3: input.iso3 ?? 'ABC',
    _orig_fname: input._orig_fname ?? 'test.csv',
  }
}

/**
 * Create a table from records, tagging provenance with `source`
 */
export function createTable(source: string, records: RecordInput[]): EventTable {
  return {
    columns: TEST_RETAINED_COLUMNS,
    rows: records.map(r => createRecord({ _orig_fname: source, ...r })),
    sources: [source],
  }
}

// =============================================================================
// Files
// =============================================================================

/**
 * Create a unique temp directory
 */
export async function createTempDir(prefix = 'acled-consolidate-test-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix))
}

/**
 * Write rows as a CSV shard; the first row's keys become the header
 */
export async function writeShard(
  dir: string,
  name: string,
  rows: Array<Record<string, string | number>>,
  header?: string[]
): Promise<string> {
  const columns = header ?? Object.keys(rows[0] ?? {})
  const lines = [columns.join(',')]
  for (const row of rows) {
    lines.push(columns.map(c => quote(String(row[c] ?? ''))).join(','))
  }
  const path = join(dir, name)
  await fs.writeFile(path, lines.join('\n') + '\n', 'utf-8')
  return path
}

function quote(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

// =============================================================================
// Fixture Shards
// =============================================================================

/**
 * First export: two events at the end of 2020 that the second export revises
 */
export const SHARD_1_ROWS = [
  { event_id_cnty: 'ABC01', event_date: '2020-01-01', timestamp: 1, iso: 123 },
  { event_id_cnty: 'ABC02', event_date: '2020-12-31', timestamp: 1, iso: 123 },
  { event_id_cnty: 'XYZ01', event_date: '2020-12-31', timestamp: 1, iso: 456 },
]

/**
 * Second export, starting on the last day of the first
 */
export const SHARD_2_ROWS = [
  { event_id_cnty: 'ABC02', event_date: '2020-12-31', timestamp: 9, iso: 123 },
  { event_id_cnty: 'ABC03', event_date: '2021-02-01', timestamp: 9, iso: 123 },
  { event_id_cnty: 'XYZ01', event_date: '2020-12-31', timestamp: 9, iso: 456 },
  { event_id_cnty: 'XYZ02', event_date: '2021-02-01', timestamp: 9, iso: 456 },
]

/**
 * An export far in the future, leaving a gap after either of the above
 */
export const SHARD_FAR_FUTURE_ROWS = [
  { event_id_cnty: 'ABC99', event_date: '2099-12-31', timestamp: '2099-12-31', iso: 123 },
]
