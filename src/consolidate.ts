/**
 * Consolidation driver
 *
 * discover -> load + normalize -> fold -> write
 *
 * @module consolidate
 */

import { join } from 'node:path'
import { resolveOutputFilename, resolveSchemaOptions } from './config'
import { writeTable } from './io/write'
import { mergeAll } from './merge'
import { discoverShards } from './shards/discover'
import { loadShard } from './shards/load'
import type { ConsolidateOptions, ConsolidateResult, EventTable } from './types'
import { logger as globalLogger } from './utils/logger'

/**
 * Consolidate and deduplicate the ACLED shards in `sourceDir`
 *
 * Shards named `NN-acled_<description>.csv` are loaded in prefix order,
 * each must overlap the dates covered by the ones before it, and for
 * every event only the version with the latest `timestamp` is kept.
 * The result is written to `consolidated_acled.csv` in the same
 * directory unless `dryRun` is set.
 *
 * @example
 * ```typescript
 * const { table, outputPath } = await consolidate('./data/acled')
 * console.log(`${table.rows.length} events written to ${outputPath}`)
 * ```
 */
export async function consolidate(
  sourceDir: string,
  options: ConsolidateOptions = {}
): Promise<ConsolidateResult> {
  const log = options.logger ?? globalLogger
  const schema = resolveSchemaOptions(options)
  const outputFilename = resolveOutputFilename(options)

  const shards = await discoverShards(sourceDir)
  log.debug(`Found ${shards.length} shards: ${shards.map(s => s.name).join(', ')}`)

  log.info('Loading CSVs...')
  const tables: EventTable[] = []
  for (const [i, shard] of shards.entries()) {
    const table = await loadShard(shard.path, schema)
    log.info(`  [${i + 1}/${shards.length}] ${shard.name}: ${table.rows.length} rows`)
    tables.push(table)
  }

  log.info('Concatenating...')
  const table = mergeAll(tables, {
    logger: log,
    onStep: (step, total, merged) => {
      log.info(`  [${step}/${total}] ${merged.rows.length} unique events`)
    },
  })

  if (options.dryRun) {
    log.info(`Dry run: ${shards.length} ACLED files validated, ${table.rows.length} events, nothing written.`)
    return { table, shards }
  }

  const outputPath = join(sourceDir, outputFilename)
  log.info(`Writing result to ${outputPath}...`)
  await writeTable(outputPath, table)

  log.info(`Done. ${shards.length} ACLED files consolidated.`)
  return { table, shards, outputPath }
}
