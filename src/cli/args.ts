/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * This file has no external dependencies to allow for easy testing.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Directory holding the `NN-acled_*.csv` shards */
  sourceDir?: string
  options: {
    help: boolean
    version: boolean
    verbose: boolean
    quiet: boolean
    dryRun: boolean
    output?: string
  }
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws Error on unknown options, a missing option value, or extra positionals
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    options: {
      help: false,
      version: false,
      verbose: false,
      quiet: false,
      dryRun: false,
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    // Handle flags
    if (arg.startsWith('-') && arg !== '-') {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        case '-q':
        case '--quiet':
          result.options.quiet = true
          break
        case '--dry-run':
          result.options.dryRun = true
          break
        case '-o':
        case '--output': {
          const output = argv[++i]
          if (!output) {
            throw new Error(`Missing value for ${arg}`)
          }
          result.options.output = output
          break
        }
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (result.sourceDir === undefined) {
      result.sourceDir = arg
    } else {
      throw new Error(`Unexpected argument: ${arg}`)
    }
    i++
  }

  if (result.options.verbose && result.options.quiet) {
    throw new Error('--verbose and --quiet cannot be used together')
  }

  return result
}
