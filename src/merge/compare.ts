/**
 * Ordering helpers for merge keys
 *
 * @module merge/compare
 */

import type { EventRecord } from '../types'

const NUMERIC = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?\s*$/i

/**
 * Code-unit string order, the same order a byte-wise sort gives for ASCII ids
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Kind rank: numbers sort before dates, dates before anything else
 */
function timestampKind(value: string): { rank: number; value: number } {
  if (NUMERIC.test(value)) return { rank: 0, value: Number(value) }
  const time = Date.parse(value)
  if (!Number.isNaN(time)) return { rank: 1, value: time }
  return { rank: 2, value: 0 }
}

/**
 * Order two `timestamp` cells
 *
 * Values of different kinds order by kind (number, then date, then
 * other text), so the order stays total on columns that mix formats.
 * Within a kind, numbers compare numerically (`9` before `10`), dates
 * chronologically, and other text by string order.
 */
export function compareTimestamps(a: string, b: string): number {
  const ka = timestampKind(a)
  const kb = timestampKind(b)
  if (ka.rank !== kb.rank) return Math.sign(ka.rank - kb.rank)
  if (ka.rank === 2) return compareStrings(a, b)
  return Math.sign(ka.value - kb.value)
}

/**
 * Dedup order: by event id, then oldest edit first
 */
export function byIdThenTimestamp(a: EventRecord, b: EventRecord): number {
  return compareStrings(a.event_id_cnty, b.event_id_cnty) || compareTimestamps(a.timestamp, b.timestamp)
}

/**
 * Output order: by event date, then event id
 */
export function byDateThenId(a: EventRecord, b: EventRecord): number {
  return compareStrings(a.event_date, b.event_date) || compareStrings(a.event_id_cnty, b.event_id_cnty)
}
