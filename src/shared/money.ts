/**
 * Amounts are stored and summed as integer minor units (100 = 1.00), so
 * totals are exact. Decimal strings are only converted at the edges.
 */

const AMOUNT_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/

export const DEFAULT_CURRENCY_SYMBOL = '₨'

/**
 * Parses a non-negative decimal amount with at most two fraction digits.
 * Returns null when the value is not such an amount.
 *
 * @example
 * parseAmount('1200')  // => 120000
 * parseAmount('12.5')  // => 1250
 * parseAmount('-3')    // => null
 */
export const parseAmount = (value: string): number | null => {
  const match = AMOUNT_PATTERN.exec(value.trim())
  if (!match) return null

  const whole = Number(match[1])
  const fraction = Number((match[2] ?? '').padEnd(2, '0'))
  const minorUnits = whole * 100 + fraction
  return Number.isSafeInteger(minorUnits) ? minorUnits : null
}

/**
 * Formats minor units with a currency symbol and thousands separators.
 *
 * @example
 * formatMoney(500000)      // => '₨5,000.00'
 * formatMoney(-20000, '$') // => '-$200.00'
 */
export const formatMoney = (
  minorUnits: number,
  symbol: string = DEFAULT_CURRENCY_SYMBOL
): string => {
  const absolute = Math.abs(minorUnits)
  const whole = Math.floor(absolute / 100).toLocaleString('en-US')
  const fraction = String(absolute % 100).padStart(2, '0')
  return `${minorUnits < 0 ? '-' : ''}${symbol}${whole}.${fraction}`
}

/**
 * Compact form for narrow terminal columns (e.g. `₨5.2k`).
 */
export const formatCompact = (
  minorUnits: number,
  symbol: string = DEFAULT_CURRENCY_SYMBOL
): string => {
  const units = Math.abs(minorUnits) / 100
  if (units >= 1000) {
    return `${minorUnits < 0 ? '-' : ''}${symbol}${(units / 1000).toFixed(1)}k`
  }
  return formatMoney(minorUnits, symbol)
}

/**
 * Share of `part` in `whole` as a percentage with one decimal, 0 when
 * `whole` is 0.
 */
export const percentOf = (part: number, whole: number): number =>
  whole === 0 ? 0 : Math.round((part / whole) * 1000) / 10
