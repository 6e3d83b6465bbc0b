/**
 * Month-key and timestamp helpers.
 *
 * A month key is a `YYYY-MM` string. Every month key in the app is derived
 * from the UTC calendar of a timestamp, so the same instant always lands in
 * the same bucket regardless of the machine's timezone.
 */

const MONTH_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/
// date, then an optional time, then an optional zone
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:(T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?)(Z|[+-]\d{2}:\d{2})?)?$/

/**
 * Checks a string is a valid `YYYY-MM` month key.
 */
export const isMonthKey = (value: string): boolean => MONTH_PATTERN.test(value)

/**
 * Parses a month key into year and month numbers.
 * Throws on anything that is not `YYYY-MM`.
 */
export const parseMonth = (month: string): { year: number; month: number } => {
  const match = MONTH_PATTERN.exec(month)
  if (!match) {
    throw new Error(`Invalid month "${month}". Expected format: YYYY-MM (e.g., 2024-03)`)
  }
  return { year: Number(match[1]), month: Number(match[2]) }
}

const formatMonth = (year: number, month: number): string =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`

/**
 * Moves a month key by `delta` calendar months, rolling over year boundaries.
 *
 * @example
 * shiftMonth('2024-01', -1) // => '2023-12'
 * shiftMonth('2023-11', 3)  // => '2024-02'
 */
export const shiftMonth = (month: string, delta: number): string => {
  const parsed = parseMonth(month)
  const index = parsed.year * 12 + (parsed.month - 1) + delta
  const year = Math.floor(index / 12)
  return formatMonth(year, index - year * 12 + 1)
}

/**
 * The `size` month keys ending at `reference` (inclusive), oldest first.
 *
 * @example
 * monthWindow('2024-02', 3) // => ['2023-12', '2024-01', '2024-02']
 */
export const monthWindow = (reference: string, size: number): string[] =>
  Array.from({ length: size }, (_, i) => shiftMonth(reference, i - size + 1))

const isCalendarDay = (year: number, month: number, day: number): boolean => {
  const date = new Date(Date.UTC(year, month - 1, day))
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  )
}

/**
 * Parses user-supplied ISO-8601 timestamps: a plain date (`2024-03-05`), a
 * datetime without zone (read as UTC) or a datetime with `Z` or an offset.
 * Returns null for anything else, including days the calendar does not have
 * (`2024-02-30`).
 */
export const parseTimestamp = (value: string): Date | null => {
  const trimmed = value.trim()
  const match = ISO_TIMESTAMP.exec(trimmed)
  if (!match) return null

  const [, year, month, day, time, zone] = match
  if (!isCalendarDay(Number(year), Number(month), Number(day))) return null

  const normalized = !time ? `${trimmed}T00:00:00.000Z` : !zone ? `${trimmed}Z` : trimmed
  const date = new Date(normalized)
  return Number.isNaN(date.getTime()) ? null : date
}

/**
 * UTC year-month of a timestamp.
 */
export const monthKeyOf = (timestamp: Date | string): string =>
  new Date(timestamp).toISOString().slice(0, 7)

/**
 * UTC calendar day (`YYYY-MM-DD`) of a timestamp.
 */
export const dayKeyOf = (timestamp: Date | string): string =>
  new Date(timestamp).toISOString().slice(0, 10)

export const currentMonth = (now: Date = new Date()): string => monthKeyOf(now)
