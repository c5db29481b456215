/**
 * Event Date Parsing Tests
 */

import { describe, it, expect } from 'vitest'
import { parseEventDate } from '../../../src/schema/date'

describe('parseEventDate', () => {
  it('accepts ISO dates', () => {
    expect(parseEventDate('2020-01-31')).toBe('2020-01-31')
  })

  it('drops a time component', () => {
    expect(parseEventDate('2020-12-31 00:00:00')).toBe('2020-12-31')
    expect(parseEventDate('2020-12-31T13:45:00Z')).toBe('2020-12-31')
    expect(parseEventDate('2020-12-31T13:45:00.123+02:00')).toBe('2020-12-31')
  })

  it('accepts the long ACLED form', () => {
    expect(parseEventDate('01 January 2020')).toBe('2020-01-01')
    expect(parseEventDate('9 feb 2021')).toBe('2021-02-09')
    expect(parseEventDate('31-Dec-2020')).toBe('2020-12-31')
  })

  it('trims whitespace', () => {
    expect(parseEventDate('  2020-01-31 ')).toBe('2020-01-31')
  })

  it('accepts leap days only in leap years', () => {
    expect(parseEventDate('2020-02-29')).toBe('2020-02-29')
    expect(parseEventDate('2021-02-29')).toBeUndefined()
  })

  it('rejects impossible and malformed dates', () => {
    expect(parseEventDate('2020-13-01')).toBeUndefined()
    expect(parseEventDate('2020-00-10')).toBeUndefined()
    expect(parseEventDate('2020-04-31')).toBeUndefined()
    expect(parseEventDate('31 Smarch 2020')).toBeUndefined()
    expect(parseEventDate('ju 2020')).toBeUndefined()
    expect(parseEventDate('12/31/2020')).toBeUndefined()
    expect(parseEventDate('')).toBeUndefined()
    expect(parseEventDate('not a date')).toBeUndefined()
  })
})
