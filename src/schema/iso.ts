/**
 * ISO country code lookup
 *
 * Very old ACLED exports carry only the numeric ISO 3166-1 code. The
 * bundled table maps those codes to the three-letter form. It is
 * validated and frozen once, when the module loads.
 *
 * @module schema/iso
 */

import { z } from 'zod'
import isoMapData from '../data/iso-map.json'
import type { IsoMap } from '../types'

const IsoMapFileSchema = z.record(
  z.string().regex(/^\d+$/, 'numeric ISO code'),
  z.string().regex(/^[A-Z]{3}$/, 'three-letter ISO code')
)

/**
 * Build an immutable lookup from a plain `{ "<numeric>": "<ISO3>" }` object
 */
export function createIsoMap(data: unknown): IsoMap {
  const parsed = IsoMapFileSchema.parse(data)
  const map = new Map<number, string>()
  for (const [code, iso3] of Object.entries(parsed)) {
    map.set(Number(code), iso3)
  }
  return map
}

/**
 * Default lookup, bundled with the package
 */
export const ISO_MAP: IsoMap = createIsoMap(isoMapData)

/**
 * Parse a raw `iso` cell into its numeric code
 *
 * Accepts integer text with optional surrounding whitespace and a
 * trailing `.0`, which spreadsheet exports sometimes add.
 */
export function parseIsoCode(value: string): number | undefined {
  const match = /^\s*(-?\d+)(?:\.0+)?\s*$/.exec(value)
  if (!match?.[1]) return undefined
  return Number(match[1])
}
