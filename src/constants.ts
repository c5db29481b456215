/**
 * Constants
 *
 * Centralized defaults for shard discovery, schema and output.
 */

// =============================================================================
// Files
// =============================================================================

/**
 * Name of the consolidated file written into the source directory
 */
export const DEFAULT_OUTPUT_FILENAME = 'consolidated_acled.csv'

/**
 * Files starting with this prefix are earlier outputs and are never read as shards
 */
export const OUTPUT_PREFIX = 'consolidated_acled'

/**
 * Shard naming convention: `NN-acled<description>.csv`
 */
export const SHARD_FILENAME_PATTERN = /^(\d{2})-acled.*\.csv$/

export const CSV_EXTENSION = '.csv'

// =============================================================================
// Columns
// =============================================================================

export const EVENT_ID_COLUMN = 'event_id_cnty'
export const EVENT_DATE_COLUMN = 'event_date'
export const TIMESTAMP_COLUMN = 'timestamp'
export const ISO_COLUMN = 'iso'
export const ISO3_COLUMN = 'iso3'

/**
 * Provenance column: base name of the shard a row was read from
 */
export const PROVENANCE_COLUMN = '_orig_fname'

/**
 * Columns kept in the consolidated table, in output order
 */
export const RETAINED_COLUMNS: readonly string[] = Object.freeze([
  'event_id_cnty', 'iso', 'iso3', 'event_date', 'year',
  'time_precision', 'event_type', 'sub_event_type',
  'actor1', 'assoc_actor_1', 'inter1', 'actor2', 'assoc_actor_2',
  'inter2', 'interaction', 'region', 'country',
  'admin1', 'admin2', 'admin3', 'location', 'latitude', 'longitude',
  'geo_precision', 'source', 'source_scale', 'notes', 'fatalities',
  'timestamp', '_orig_fname',
])

// =============================================================================
// Logging
// =============================================================================

/**
 * Environment variable read for the default CLI log level
 */
export const LOG_LEVEL_ENV = 'ACLED_CONSOLIDATE_LOG_LEVEL'
