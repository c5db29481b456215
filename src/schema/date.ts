/**
 * Event date parsing
 *
 * ACLED has shipped `event_date` in two shapes over the years: ISO dates
 * (`2020-01-31`, sometimes with a midnight time attached) and the long
 * form `31 January 2020`. Both reduce to a calendar date, kept as a
 * `YYYY-MM-DD` string so that string order equals date order.
 *
 * @module schema/date
 */

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/
const LONG_DATE = /^(\d{1,2})[ -]([A-Za-z]+)[ -](\d{4})$/

/**
 * Parse an event date into canonical `YYYY-MM-DD` form
 *
 * @returns The canonical date, or undefined if the value is not a real calendar date
 */
export function parseEventDate(value: string): string | undefined {
  const text = value.trim()

  const iso = ISO_DATE.exec(text)
  if (iso) {
    return toCanonical(Number(iso[1]), Number(iso[2]), Number(iso[3]))
  }

  const long = LONG_DATE.exec(text)
  if (long) {
    const month = monthNumber(long[2] ?? '')
    if (month === undefined) return undefined
    return toCanonical(Number(long[3]), month, Number(long[1]))
  }

  return undefined
}

/**
 * Month number (1-12) for a full or three-letter English month name
 */
function monthNumber(name: string): number | undefined {
  const lower = name.toLowerCase()
  if (lower.length < 3) return undefined
  const index = MONTHS.findIndex(m => m === lower || (lower.length === 3 && m.startsWith(lower)))
  return index === -1 ? undefined : index + 1
}

function toCanonical(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1) return undefined

  // Date.UTC rolls 2021-02-30 over into March; reject anything that moved
  const date = new Date(Date.UTC(year, month - 1, day))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined
  }

  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}
