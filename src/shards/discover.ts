/**
 * Shard Discoverer
 *
 * Finds the ACLED export files in a directory and orders them by the
 * two-digit sequence prefix in their names.
 *
 * @module shards/discover
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { CSV_EXTENSION, OUTPUT_PREFIX, SHARD_FILENAME_PATTERN } from '../constants'
import { ErrorCode, NotFoundError, ValidationError, toError } from '../errors'
import type { Shard } from '../types'

export interface DiscoverResult {
  shards: Shard[]
  /** Files that break the naming convention */
  invalid: string[]
}

/**
 * Classify file names into shards and invalid names
 *
 * Non-CSV names and earlier outputs are left out of both lists.
 */
export function classifyShardNames(sourceDir: string, names: readonly string[]): DiscoverResult {
  const shards: Shard[] = []
  const invalid: string[] = []

  for (const name of names) {
    if (!name.endsWith(CSV_EXTENSION)) continue
    if (name.startsWith(OUTPUT_PREFIX)) continue

    const match = SHARD_FILENAME_PATTERN.exec(name)
    if (match?.[1] === undefined) {
      invalid.push(name)
      continue
    }

    shards.push({ index: Number(match[1]), name, path: join(sourceDir, name) })
  }

  shards.sort((a, b) => a.index - b.index || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  invalid.sort()

  return { shards, invalid }
}

/**
 * List the shards in `sourceDir`, sorted by numeric prefix
 *
 * @throws NotFoundError if the directory does not exist
 * @throws ValidationError if any CSV file is misnamed or fewer than two shards exist
 */
export async function discoverShards(sourceDir: string): Promise<Shard[]> {
  let names: string[]
  try {
    const entries = await fs.readdir(sourceDir, { withFileTypes: true })
    names = []
    for (const entry of entries) {
      if (entry.isFile() || (entry.isSymbolicLink() && !(await isDirectory(join(sourceDir, entry.name))))) {
        names.push(entry.name)
      }
    }
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new NotFoundError(sourceDir, error)
    }
    throw toError(error)
  }

  const { shards, invalid } = classifyShardNames(sourceDir, names)

  if (invalid.length > 0) {
    throw new ValidationError(
      `Found ${invalid.length} invalid ACLED source file(s).\n` +
        `Each CSV file in the source directory (other than output files starting with '${OUTPUT_PREFIX}') ` +
        'must follow the naming pattern:\n' +
        '    NN-acled_<description>.csv\n' +
        'Examples:\n' +
        '  - 01-acled_2021_download.csv\n' +
        '  - 02-acled_2022_update.csv\n' +
        'Invalid files found:\n' +
        invalid.map(name => `  - ${name}`).join('\n'),
      ErrorCode.INVALID_SHARD_NAME,
      { files: invalid }
    )
  }

  if (shards.length < 2) {
    throw new ValidationError(
      'At least two valid ACLED source files are required.',
      ErrorCode.TOO_FEW_SHARDS,
      { found: shards.map(s => s.name) }
    )
  }

  return shards
}

/**
 * Follows symlinks. A dangling link is not a directory, so it stays a
 * candidate and fails loudly when loaded.
 */
async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory()
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ELOOP')) {
      return false
    }
    throw toError(error)
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
