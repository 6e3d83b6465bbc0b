import type { OutputFormat } from './args.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
  /** Output warning to stderr */
  warn(message: string): void
}

const hasFormatted = (data: unknown): data is { formatted: string } =>
  typeof data === 'object' && data !== null && 'formatted' in data && typeof data.formatted === 'string'

/**
 * Create an output formatter based on format and quiet settings
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => {
  const progress = (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  }

  const warn = (message: string) => {
    process.stderr.write(`Warning: ${message}\n`)
  }

  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, null, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, null, 2))
        process.exit(1)
      },
      progress,
      warn,
    }
  }

  // Text format
  return {
    success: <T>(data: T) => {
      if (typeof data === 'string') {
        console.log(data)
      } else if (hasFormatted(data)) {
        console.log(data.formatted)
      } else {
        console.log(JSON.stringify(data, null, 2))
      }
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details) {
        console.error(typeof details === 'string' ? details : JSON.stringify(details, null, 2))
      }
      process.exit(1)
    },
    progress,
    warn,
  }
}

/**
 * Formats a percentage with one decimal place.
 */
export const formatPercent = (value: number): string => `${value.toFixed(1)}%`

/**
 * Creates a progress bar visual for budget utilization.
 *
 * @example
 * progressBar(50)  // => '[=====     ]'
 * progressBar(130) // => '[==========]'
 */
export const progressBar = (percent: number, width = 10): string => {
  const filled = Math.max(0, Math.min(Math.round((percent / 100) * width), width))
  return `[${'='.repeat(filled)}${' '.repeat(width - filled)}]`
}

export interface TableOptions {
  /** Column indexes padded on the left, for amounts */
  alignRight?: readonly number[]
}

/**
 * Plain text table, two spaces between columns, trailing blanks trimmed.
 *
 * @example
 * formatTable(['Category', 'Spent'], [['Food', '₨12.00']], { alignRight: [1] })
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  { alignRight = [] }: TableOptions = {}
): string => {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  )

  const formatRow = (cells: string[]) =>
    cells
      .map((cell, i) => (alignRight.includes(i) ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
      .join('  ')
      .trimEnd()

  return [formatRow(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(formatRow)].join(
    '\n'
  )
}
