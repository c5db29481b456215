/**
 * Output Writer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { formatTable, writeTable } from '../../../src/io/write'
import { StorageError } from '../../../src/errors'
import { createTable, createTempDir } from '../../factories'

describe('formatTable', () => {
  it('writes a header and one line per row', () => {
    const table = createTable('01-acled_a.csv', [
      { event_id_cnty: 'ABC01', event_date: '2020-01-01', timestamp: '1' },
    ])

    expect(formatTable(table)).toBe(
      'event_id_cnty,timestamp,event_date,iso,iso3,_orig_fname\n' +
        'ABC01,1,2020-01-01,123,ABC,01-acled_a.csv\n'
    )
  })

  it('quotes fields containing delimiters, quotes and newlines', () => {
    const table = {
      columns: ['event_id_cnty', 'event_date', 'timestamp', 'notes'],
      rows: [
        { event_id_cnty: 'A', event_date: '2020-01-01', timestamp: '1', notes: 'a, b' },
        { event_id_cnty: 'B', event_date: '2020-01-01', timestamp: '1', notes: 'said "no"' },
        { event_id_cnty: 'C', event_date: '2020-01-01', timestamp: '1', notes: 'two\nlines' },
      ],
      sources: ['01-acled_a.csv'],
    }

    expect(formatTable(table)).toBe(
      'event_id_cnty,event_date,timestamp,notes\n' +
        'A,2020-01-01,1,"a, b"\n' +
        'B,2020-01-01,1,"said ""no"""\n' +
        'C,2020-01-01,1,"two\nlines"\n'
    )
  })

  it('writes only the header for an empty table', () => {
    expect(formatTable(createTable('01-acled_a.csv', []))).toBe(
      'event_id_cnty,timestamp,event_date,iso,iso3,_orig_fname\n'
    )
  })
})

describe('writeTable', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('replaces an existing file and leaves no temp files behind', async () => {
    const path = join(tempDir, 'consolidated_acled.csv')
    await fs.writeFile(path, 'stale')
    const table = createTable('01-acled_a.csv', [{ event_id_cnty: 'ABC01' }])

    await writeTable(path, table)

    expect(await fs.readFile(path, 'utf-8')).toBe(formatTable(table))
    expect(await fs.readdir(tempDir)).toEqual(['consolidated_acled.csv'])
  })

  it('fails with StorageError when the directory is missing', async () => {
    const path = join(tempDir, 'missing', 'consolidated_acled.csv')

    await expect(writeTable(path, createTable('01-acled_a.csv', []))).rejects.toBeInstanceOf(StorageError)
  })
})
