/**
 * CLI Argument Parser Tests
 */

import { describe, it, expect } from 'vitest'
import { parseArgs } from '../../../src/cli/args'

describe('parseArgs', () => {
  it('takes the source directory as the only positional', () => {
    const parsed = parseArgs(['./data'])

    expect(parsed.sourceDir).toBe('./data')
    expect(parsed.options).toEqual({
      help: false,
      version: false,
      verbose: false,
      quiet: false,
      dryRun: false,
    })
  })

  it('parses flags in any position', () => {
    const parsed = parseArgs(['--verbose', './data', '--dry-run', '-o', 'consolidated_acled_x.csv'])

    expect(parsed.sourceDir).toBe('./data')
    expect(parsed.options.verbose).toBe(true)
    expect(parsed.options.dryRun).toBe(true)
    expect(parsed.options.output).toBe('consolidated_acled_x.csv')
  })

  it('parses help, version and quiet', () => {
    expect(parseArgs(['-h']).options.help).toBe(true)
    expect(parseArgs(['--version']).options.version).toBe(true)
    expect(parseArgs(['-q', 'dir']).options.quiet).toBe(true)
  })

  it('leaves the source directory unset when absent', () => {
    expect(parseArgs([]).sourceDir).toBeUndefined()
  })

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--format', 'json'])).toThrow('Unknown option: --format')
  })

  it('rejects a second positional', () => {
    expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b')
  })

  it('rejects --output without a value', () => {
    expect(() => parseArgs(['dir', '--output'])).toThrow('Missing value for --output')
  })

  it('rejects --verbose with --quiet', () => {
    expect(() => parseArgs(['dir', '--verbose', '--quiet'])).toThrow('--verbose and --quiet cannot be used together')
  })
})
