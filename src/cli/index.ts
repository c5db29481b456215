#!/usr/bin/env node
/**
 * acled-consolidate CLI
 *
 * Consolidate multiple ACLED CSV exports into one unified dataset.
 *
 * Usage:
 *   acled-consolidate [options] <source_dir>
 */

import { consolidate } from '../consolidate'
import { logLevelFromEnv } from '../config'
import { LOG_LEVEL_ENV } from '../constants'
import { createConsoleLogger, setLogger, type Logger, type LogLevel } from '../utils/logger'
import { parseArgs, type ParsedArgs } from './args'

export type { ParsedArgs } from './args'

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0'

const HELP_TEXT = `
acled-consolidate v${VERSION}

Consolidate multiple ACLED CSV files into one unified dataset.

USAGE:
  acled-consolidate [options] <source_dir>

ARGUMENTS:
  source_dir                    Directory containing ACLED source files named
                                NN-acled_<description>.csv

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -o, --output <name>           Output file name (default: consolidated_acled.csv)
      --dry-run                 Validate and merge without writing output
      --verbose                 Log debug detail, including stack traces
  -q, --quiet                   Only log warnings and errors

ENVIRONMENT:
  ${LOG_LEVEL_ENV}   Default log level: debug, info, warn, error, silent

EXAMPLES:
  # Merge ./acled/01-acled_2021.csv, ./acled/02-acled_2022.csv, ...
  acled-consolidate ./acled

  # Check a directory without writing anything
  acled-consolidate --dry-run ./acled
`

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Pick the log level: flags win over the environment
 */
export function resolveLogLevel(parsed: ParsedArgs, env: NodeJS.ProcessEnv): LogLevel {
  if (parsed.options.verbose) return 'debug'
  if (parsed.options.quiet) return 'warn'
  return logLevelFromEnv(env)
}

/**
 * Main CLI entry point
 *
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let parsed: ParsedArgs
  try {
    parsed = parseArgs(argv)
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error))
    print(HELP_TEXT)
    return 1
  }

  if (parsed.options.help) {
    print(HELP_TEXT)
    return 0
  }

  if (parsed.options.version) {
    print(`acled-consolidate v${VERSION}`)
    return 0
  }

  if (parsed.sourceDir === undefined) {
    printError('Missing argument: source_dir')
    print(HELP_TEXT)
    return 1
  }

  let log: Logger
  try {
    log = createConsoleLogger(resolveLogLevel(parsed, env))
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error))
    return 1
  }
  setLogger(log)

  try {
    await consolidate(parsed.sourceDir, {
      outputFilename: parsed.options.output,
      dryRun: parsed.options.dryRun,
      logger: log,
    })
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log.error(`Failed to consolidate ACLED data: ${message}`)
    log.debug('Full traceback:', error instanceof Error ? error.stack : error)
    return 1
  }
}

/**
 * True when `current` is the module Node was started with. npm links the
 * bin through a symlink, so the check goes by module identity, not path.
 */
export function isEntryModule(main: unknown, current: unknown): boolean {
  return main !== undefined && main === current
}

// Run CLI if this is the main module
if (typeof require !== 'undefined' && typeof module !== 'undefined' && isEntryModule(require.main, module)) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error(error)
      process.exit(1)
    }
  )
}
