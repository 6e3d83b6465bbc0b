import type { BudgetOptions } from '../args.js'
import { createFormatter, formatPercent, formatTable, progressBar } from '../output.js'
import { resolveMonth, type CommandContext } from './command-context.js'
import { budgetStatus } from './dashboard.js'
import { formatMoney } from '../../shared/money.js'
import { ValidationError } from '../../shared/errors.js'
import {
  budgetOverview,
  setBudgets,
  type BudgetOverviewRow,
} from '../../budgets/budget-service.js'

/**
 * Turns `--set Food=1000 --set Bills=450` into an allocation map.
 */
export const parseAllocations = (entries: string[]): Record<string, string> => {
  const allocations: Record<string, string> = {}
  const malformed: string[] = []

  for (const entry of entries) {
    const separator = entry.indexOf('=')
    if (separator <= 0) {
      malformed.push(`"${entry}" must look like Category=amount`)
      continue
    }
    allocations[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim()
  }

  if (malformed.length > 0) {
    throw new ValidationError('Invalid budget allocations', { set: malformed })
  }
  return allocations
}

export const formatTextBudgets = (
  month: string,
  rows: BudgetOverviewRow[],
  symbol: string
): string => {
  const money = (value: number) => formatMoney(value, symbol)
  const lines: string[] = ['', `  Budgets: ${month}`, '']

  lines.push(
    formatTable(
      ['Category', 'Allocated', 'Spent', 'Remaining', 'Used', '', 'Status'],
      rows.map((row) =>
        row.hasBudget
          ? [
              row.category,
              money(row.allocated),
              money(row.spent),
              money(row.remaining),
              formatPercent(row.percentUsed),
              progressBar(row.percentUsed),
              budgetStatus(row),
            ]
          : [row.category, '-', money(row.spent), '-', '-', '', '-']
      ),
      { alignRight: [1, 2, 3, 4] }
    )
  )
  lines.push('')

  return lines.join('\n')
}

/**
 * Shows every category's usage, after applying any `--set` allocations.
 *
 * @example
 * spendly budget --month 2024-03 --set Food=1000 --set Bills=450
 */
export const budgetCommand = (options: BudgetOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, now, config } = context
  const month = resolveMonth(options.month, now)

  if (options.set.length > 0) {
    const saved = setBudgets(store, ctx, month, parseAllocations(options.set))
    formatter.progress(`Saved ${saved.length} allocation(s) for ${month}`)
  }

  const rows = budgetOverview(store, ctx, month)

  formatter.success({
    success: true,
    month,
    budgets: rows,
    ...(options.format === 'text'
      ? { formatted: formatTextBudgets(month, rows, config.currency.symbol) }
      : {}),
  })
}
