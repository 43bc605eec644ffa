import { ValidationError } from '../errors'

// 2030-01-01, 2030-01-01T12:00, 2030-01-01 12:00:00.5+02:00
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/i

// Sat, 15 Jun 2030 08:00:00 GMT, 15 Jun 2030 10:00 +0200
const RFC_2822 =
  /^(?:(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*)?(\d{1,2})\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?(?:\s+(GMT|UTC?|Z|[+-]\d{4}))?$/i

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

interface DateParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  /** Minutes east of UTC */
  offsetMinutes: number
}

function numberOr(value: string | undefined, fallback = 0): number {
  return value === undefined ? fallback : Number(value)
}

/**
 * Zone designator to minutes east of UTC. No zone means UTC.
 */
function parseOffset(zone: string | undefined): number | undefined {
  if (zone === undefined) return 0

  const upper = zone.toUpperCase()
  if (upper === 'Z' || upper === 'GMT' || upper === 'UT' || upper === 'UTC') return 0

  const digits = zone.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = Number(digits.slice(2))
  if (hours > 23 || minutes > 59) return undefined

  const sign = zone.startsWith('-') ? -1 : 1
  return sign * (hours * 60 + minutes)
}

function fromIso(match: RegExpExecArray): DateParts | undefined {
  const offsetMinutes = parseOffset(match[8])
  if (offsetMinutes === undefined) return undefined

  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: numberOr(match[4]),
    minute: numberOr(match[5]),
    second: numberOr(match[6]),
    millisecond: match[7] === undefined ? 0 : Number(match[7].padEnd(3, '0').slice(0, 3)),
    offsetMinutes,
  }
}

function fromRfc2822(match: RegExpExecArray): DateParts | undefined {
  const offsetMinutes = parseOffset(match[7])
  if (offsetMinutes === undefined) return undefined

  return {
    year: Number(match[3]),
    month: MONTHS.indexOf(match[2].toLowerCase()) + 1,
    day: Number(match[1]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: numberOr(match[6]),
    millisecond: 0,
    offsetMinutes,
  }
}

/**
 * Build the instant, rejecting out-of-range fields and dates that do not exist
 * (2030-02-30 must not roll over into March).
 */
function toDate(parts: DateParts): Date | undefined {
  if (parts.month < 1 || parts.month > 12) return undefined
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) return undefined

  const calendar = new Date(Date.UTC(parts.year, parts.month - 1, parts.day))
  if (
    calendar.getUTCFullYear() !== parts.year ||
    calendar.getUTCMonth() !== parts.month - 1 ||
    calendar.getUTCDate() !== parts.day
  ) {
    return undefined
  }

  const utc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    parts.millisecond
  )
  return new Date(utc - parts.offsetMinutes * 60_000)
}

/**
 * Date parsing for validity windows.
 *
 * Accepts ISO-8601 (date only, or date-time with an optional zone),
 * "YYYY-MM-DD HH:MM[:SS]" and RFC 2822. Times without a zone are UTC.
 * Returns undefined for empty input.
 *
 * @throws ValidationError when a non-empty string is not one of those forms or names no real date
 */
export function parseDateString(input: string | undefined, field: string): Date | undefined {
  if (input === undefined) return undefined

  const trimmed = input.trim()
  if (trimmed === '') return undefined

  const iso = ISO_DATE_TIME.exec(trimmed)
  const rfc = iso ? null : RFC_2822.exec(trimmed)
  const parts = iso ? fromIso(iso) : rfc ? fromRfc2822(rfc) : undefined
  const date = parts ? toDate(parts) : undefined

  if (!date) {
    // The value itself is sensitive, keep it out of the message
    throw new ValidationError(`${field} could not be parsed as a date`, [`${field}: invalid date`])
  }

  return date
}
