/**
 * Merge Engine
 *
 * Folds shards left to right into one table. Each step checks that the
 * next shard starts no later than the accumulated data ends, unions the
 * two, keeps the most recently edited version of every event, and
 * re-sorts by date.
 *
 * @module merge
 */

import { ConsolidationError, ErrorCode, ValidationError } from '../errors'
import type { EventRecord, EventTable } from '../types'
import { logger, type Logger } from '../utils/logger'
import { byDateThenId, byIdThenTimestamp, compareStrings } from './compare'

export { compareStrings, compareTimestamps, byDateThenId, byIdThenTimestamp } from './compare'

/**
 * Progress callback for {@link mergeAll}
 */
export type MergeStepCallback = (step: number, total: number, merged: EventTable) => void

export interface MergeOptions {
  /** Called after every fold step, 1-based */
  onStep?: MergeStepCallback
  logger?: Logger
}

// =============================================================================
// Single Step
// =============================================================================

/**
 * Merge two tables with touching or overlapping date ranges
 *
 * When both tables hold the same `event_id_cnty`, the row with the
 * higher `timestamp` is kept. On an exact timestamp tie the row from
 * `right` wins.
 *
 * @throws ValidationError if either table is empty, or if `left` ends
 * before `right` starts
 */
export function mergeTables(left: EventTable, right: EventTable): EventTable {
  for (const table of [left, right]) {
    if (table.rows.length === 0) {
      throw new ValidationError(
        `Cannot merge empty ACLED shards: ${describeSources(table.sources)} has no rows.`,
        ErrorCode.EMPTY_SHARD,
        { sources: table.sources }
      )
    }
  }

  const leftEnd = maxDate(left.rows)
  const rightStart = minDate(right.rows)
  if (leftEnd < rightStart) {
    throw new ValidationError(
      `ACLED shards must have overlapping dates to avoid data gaps: ` +
        `${describeSources(left.sources)} ends on ${leftEnd} but ` +
        `${describeSources(right.sources)} starts on ${rightStart}.`,
      ErrorCode.SHARD_GAP,
      { left: left.sources, right: right.sources, leftEnd, rightStart }
    )
  }

  // Array.prototype.sort is stable, so equal timestamps keep union order
  const union = [...left.rows, ...right.rows].sort(byIdThenTimestamp)
  const latest: EventRecord[] = []
  for (let i = 0; i < union.length; i++) {
    const row = union[i]
    const next = union[i + 1]
    if (row && (!next || next.event_id_cnty !== row.event_id_cnty)) {
      latest.push(row)
    }
  }
  latest.sort(byDateThenId)

  return {
    columns: left.columns,
    rows: latest,
    sources: [...left.sources, ...right.sources],
  }
}

// =============================================================================
// Fold
// =============================================================================

/**
 * Fold an ordered list of tables into one, oldest first
 *
 * @throws ValidationError if fewer than two tables are given, or a step fails
 * @throws ConsolidationError if a step leaves duplicate event ids behind
 */
export function mergeAll(tables: readonly EventTable[], options: MergeOptions = {}): EventTable {
  const [first, ...rest] = tables
  if (!first || rest.length === 0) {
    throw new ValidationError(
      'At least two valid ACLED source files are required.',
      ErrorCode.TOO_FEW_SHARDS,
      { found: tables.flatMap(t => t.sources) }
    )
  }

  const log = options.logger ?? logger
  let merged = first
  rest.forEach((next, i) => {
    merged = mergeTables(merged, next)

    const duplicates = findDuplicateIds(merged.rows)
    if (duplicates.length > 0) {
      throw new ConsolidationError(
        `Merge left duplicate event ids behind: ${duplicates.join(', ')}`,
        ErrorCode.INTERNAL,
        { duplicates }
      )
    }

    log.debug(`Merged ${next.sources.join(', ')}: ${merged.rows.length} rows`)
    options.onStep?.(i + 1, rest.length, merged)
  })

  return merged
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Event ids that occur more than once, sorted
 */
export function findDuplicateIds(rows: readonly EventRecord[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const row of rows) {
    if (seen.has(row.event_id_cnty)) {
      duplicates.add(row.event_id_cnty)
    }
    seen.add(row.event_id_cnty)
  }
  return [...duplicates].sort(compareStrings)
}

function maxDate(rows: readonly EventRecord[]): string {
  return rows.reduce((max, row) => (row.event_date > max ? row.event_date : max), rows[0]?.event_date ?? '')
}

function minDate(rows: readonly EventRecord[]): string {
  return rows.reduce((min, row) => (row.event_date < min ? row.event_date : min), rows[0]?.event_date ?? '')
}

function describeSources(sources: readonly string[]): string {
  const first = sources[0]
  const last = sources[sources.length - 1]
  if (first === undefined || last === undefined) return 'table'
  return first === last ? first : `${first} through ${last}`
}
