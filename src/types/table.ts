/**
 * Table types for shard loading and merging
 *
 * @module types/table
 */

import type { Logger } from '../utils/logger'

/**
 * One row of an ACLED table: column name to cell text.
 *
 * After normalization every retained column is present. `event_date`
 * holds the canonical `YYYY-MM-DD` form.
 */
export interface EventRecord {
  event_id_cnty: string
  event_date: string
  timestamp: string
  [column: string]: string
}

/**
 * An in-memory table read from one or more shards
 */
export interface EventTable {
  /** Column names in output order */
  columns: readonly string[]
  rows: EventRecord[]
  /** Shard file names folded into this table, oldest first */
  sources: readonly string[]
}

/**
 * A discovered input file
 */
export interface Shard {
  /** Two-digit sequence prefix, lower is earlier coverage */
  index: number
  /** Base file name */
  name: string
  /** Absolute or caller-relative path */
  path: string
}

/**
 * Numeric ISO 3166-1 code to alpha-3 code
 */
export type IsoMap = ReadonlyMap<number, string>

/**
 * Schema options shared by the loader and normalizer
 */
export interface SchemaOptions {
  /** Columns to keep, in output order */
  retainedColumns?: readonly string[]
  /** Lookup used to derive `iso3` when a shard lacks it */
  isoMap?: IsoMap
}

/**
 * Options for a full consolidation run
 */
export interface ConsolidateOptions extends SchemaOptions {
  /** Output file name inside the source directory */
  outputFilename?: string
  /** Validate and merge without writing the output */
  dryRun?: boolean
  logger?: Logger
}

/**
 * Result of a consolidation run
 */
export interface ConsolidateResult {
  table: EventTable
  shards: Shard[]
  /** Path of the written file, or undefined on a dry run */
  outputPath?: string
}
