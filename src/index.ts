/**
 * acled-consolidate
 *
 * Merge sequential, overlapping ACLED CSV exports into one
 * deduplicated, date-ordered dataset.
 *
 * @packageDocumentation
 */

export { consolidate } from './consolidate'
export { discoverShards, classifyShardNames, type DiscoverResult } from './shards/discover'
export { loadShard, parseShard } from './shards/load'
export { normalizeTable, type RawTable } from './schema/normalize'
export { parseEventDate } from './schema/date'
export { ISO_MAP, createIsoMap, parseIsoCode } from './schema/iso'
export {
  mergeTables,
  mergeAll,
  findDuplicateIds,
  compareTimestamps,
  type MergeOptions,
  type MergeStepCallback,
} from './merge'
export { formatTable, writeTable } from './io/write'
export { resolveSchemaOptions, resolveOutputFilename, logLevelFromEnv, KEY_COLUMNS } from './config'
export * from './constants'
export * from './errors'
export * from './types'
export {
  type Logger,
  type LogLevel,
  LOG_LEVELS,
  consoleLogger,
  noopLogger,
  createConsoleLogger,
  setLogger,
  logger,
} from './utils/logger'
