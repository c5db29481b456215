/**
 * Configuration
 *
 * Resolves caller options against the defaults in `constants.ts` and
 * reads the CLI log level from the environment.
 *
 * @module config
 */

import { z } from 'zod'
import {
  DEFAULT_OUTPUT_FILENAME,
  EVENT_DATE_COLUMN,
  EVENT_ID_COLUMN,
  LOG_LEVEL_ENV,
  OUTPUT_PREFIX,
  RETAINED_COLUMNS,
  TIMESTAMP_COLUMN,
  CSV_EXTENSION,
} from '../constants'
import { ErrorCode, ValidationError } from '../errors'
import { ISO_MAP } from '../schema/iso'
import type { ConsolidateOptions, IsoMap, SchemaOptions } from '../types'
import { LOG_LEVELS, type LogLevel } from '../utils/logger'

/**
 * Columns the merge engine reads; every retained-column list must contain them
 */
export const KEY_COLUMNS: readonly string[] = [EVENT_ID_COLUMN, EVENT_DATE_COLUMN, TIMESTAMP_COLUMN]

export interface ResolvedSchemaOptions {
  retainedColumns: readonly string[]
  isoMap: IsoMap
}

/**
 * Fill schema options with defaults and check that the key columns are retained
 */
export function resolveSchemaOptions(options: SchemaOptions = {}): ResolvedSchemaOptions {
  const retainedColumns = options.retainedColumns ?? RETAINED_COLUMNS
  const missingKeys = KEY_COLUMNS.filter(column => !retainedColumns.includes(column))
  if (missingKeys.length > 0) {
    throw new ValidationError(
      `Retained columns must include: ${missingKeys.join(', ')}`,
      ErrorCode.INVALID_ARGUMENT,
      { missing: missingKeys }
    )
  }

  return {
    retainedColumns,
    isoMap: options.isoMap ?? ISO_MAP,
  }
}

/**
 * Check an output file name: later runs must skip it during discovery
 */
export function resolveOutputFilename(options: Pick<ConsolidateOptions, 'outputFilename'> = {}): string {
  const name = options.outputFilename ?? DEFAULT_OUTPUT_FILENAME
  if (!name.startsWith(OUTPUT_PREFIX) || !name.endsWith(CSV_EXTENSION) || /[\\/]/.test(name)) {
    throw new ValidationError(
      `Invalid output file name "${name}": expected a plain file name starting with "${OUTPUT_PREFIX}" and ending with "${CSV_EXTENSION}"`,
      ErrorCode.INVALID_ARGUMENT,
      { outputFilename: name }
    )
  }
  return name
}

const LogLevelSchema = z.enum(LOG_LEVELS)

/**
 * Read the default log level from the environment
 *
 * @returns The configured level, or `fallback` when the variable is unset
 * @throws ValidationError when the variable names an unknown level
 */
export function logLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'info'
): LogLevel {
  const raw = env[LOG_LEVEL_ENV]
  if (raw === undefined || raw === '') return fallback

  const result = LogLevelSchema.safeParse(raw.trim().toLowerCase())
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${LOG_LEVEL_ENV}: ${raw}. Valid levels: ${LOG_LEVELS.join(', ')}`,
      ErrorCode.INVALID_ARGUMENT,
      { value: raw }
    )
  }
  return result.data
}
