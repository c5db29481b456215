/**
 * ISO Lookup Tests
 */

import { describe, it, expect } from 'vitest'
import { ISO_MAP, createIsoMap, parseIsoCode } from '../../../src/schema/iso'

describe('ISO_MAP', () => {
  it('maps numeric codes to three-letter codes', () => {
    expect(ISO_MAP.get(4)).toBe('AFG')
    expect(ISO_MAP.get(404)).toBe('KEN')
    expect(ISO_MAP.get(566)).toBe('NGA')
    expect(ISO_MAP.get(887)).toBe('YEM')
  })

  it('maps ACLED code 0 to Kosovo', () => {
    expect(ISO_MAP.get(0)).toBe('XKX')
  })

  it('has no entry for unassigned codes', () => {
    expect(ISO_MAP.has(999)).toBe(false)
  })
})

describe('createIsoMap', () => {
  it('builds a lookup keyed by number', () => {
    const map = createIsoMap({ '123': 'ABC' })

    expect(map.get(123)).toBe('ABC')
    expect(map.size).toBe(1)
  })

  it('rejects malformed entries', () => {
    expect(() => createIsoMap({ '123': 'abcd' })).toThrow()
    expect(() => createIsoMap({ abc: 'ABC' })).toThrow()
    expect(() => createIsoMap(['ABC'])).toThrow()
  })
})

describe('parseIsoCode', () => {
  it('parses integer text', () => {
    expect(parseIsoCode('404')).toBe(404)
    expect(parseIsoCode(' 404 ')).toBe(404)
    expect(parseIsoCode('404.0')).toBe(404)
  })

  it('rejects anything else', () => {
    expect(parseIsoCode('')).toBeUndefined()
    expect(parseIsoCode('40.5')).toBeUndefined()
    expect(parseIsoCode('KEN')).toBeUndefined()
  })
})
