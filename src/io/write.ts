/**
 * Output writer
 *
 * Serialises a consolidated table to CSV and replaces the target file
 * atomically (write to .tmp then rename).
 *
 * @module io/write
 */

import { promises as fs } from 'node:fs'
import { randomBytes } from 'node:crypto'
import { stringify } from 'csv-stringify/sync'
import { ErrorCode, StorageError, toError } from '../errors'
import type { EventTable } from '../types'
import { logger } from '../utils/logger'

/**
 * Render a table as CSV text with a header row
 */
export function formatTable(table: EventTable): string {
  return stringify(table.rows, {
    header: true,
    columns: [...table.columns],
  })
}

/**
 * Write a table to `path`, replacing any existing file
 *
 * @throws StorageError if the file cannot be written
 */
export async function writeTable(path: string, table: EventTable): Promise<void> {
  const tempPath = `${path}.tmp.${Date.now()}.${randomBytes(5).toString('hex')}`

  try {
    await fs.writeFile(tempPath, formatTable(table), 'utf-8')
    await fs.rename(tempPath, path)
  } catch (error: unknown) {
    try {
      await fs.unlink(tempPath)
    } catch (cleanupError) {
      // Temp file may never have been created
      logger.debug(`Failed to clean up temp file ${tempPath}`, cleanupError)
    }
    throw new StorageError(
      `Failed to write ${path}: ${toError(error).message}`,
      ErrorCode.STORAGE_WRITE_ERROR,
      { path },
      toError(error)
    )
  }
}
