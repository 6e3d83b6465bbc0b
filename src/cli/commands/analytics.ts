import type { MonthOptions } from '../args.js'
import { createFormatter, formatPercent, formatTable } from '../output.js'
import { resolveMonth, type CommandContext } from './command-context.js'
import { formatMoney } from '../../shared/money.js'
import { buildAnalyticsSeries, type AnalyticsSeries } from '../../reporting/index.js'

const divider = '─'.repeat(60)

export const formatTextAnalytics = (series: AnalyticsSeries, symbol: string): string => {
  const money = (value: number) => formatMoney(value, symbol)
  const lines: string[] = []

  lines.push('')
  lines.push(`  Analytics: ${series.months[0]} to ${series.referenceMonth}`)
  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push(
    formatTable(
      ['Month', 'Income', 'Expenses', 'Investments', 'Savings'],
      [
        ...series.points.map((p) => [
          p.month,
          money(p.income),
          money(p.expenses),
          money(p.investments),
          money(p.savings),
        ]),
        [
          'Total',
          money(series.totals.income),
          money(series.totals.expenses),
          money(series.totals.investments),
          money(series.totals.savings),
        ],
      ],
      { alignRight: [1, 2, 3, 4] }
    )
  )
  lines.push('')
  lines.push(`  Savings Rate:   ${formatPercent(series.savingsRate)}`)

  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  EXPENSES BY CATEGORY')
  lines.push('')
  if (series.expensesByCategory.length === 0) {
    lines.push('  No expenses in this period.')
  } else {
    lines.push(
      formatTable(
        ['Category', 'Spent', 'Count', '% of Total'],
        series.expensesByCategory.map((e) => [
          e.key,
          money(e.total),
          String(e.count),
          formatPercent(e.percentOfTotal),
        ]),
        { alignRight: [1, 2, 3] }
      )
    )
  }

  lines.push('')
  lines.push('  INVESTMENTS BY TYPE')
  lines.push('')
  if (series.investmentsByType.length === 0) {
    lines.push('  No investments in this period.')
  } else {
    lines.push(
      formatTable(
        ['Type', 'Invested', 'Count', '% of Total'],
        series.investmentsByType.map((e) => [
          e.key,
          money(e.total),
          String(e.count),
          formatPercent(e.percentOfTotal),
        ]),
        { alignRight: [1, 2, 3] }
      )
    )
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * @example
 * spendly analytics --month 2024-12 --format text
 */
export const analyticsCommand = (options: MonthOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const month = resolveMonth(options.month, context.now)

  formatter.progress(`Building 12-month series ending ${month}...`)

  const series = buildAnalyticsSeries(context.store, context.ctx, month)

  formatter.success({
    success: true,
    series,
    ...(options.format === 'text'
      ? { formatted: formatTextAnalytics(series, context.config.currency.symbol) }
      : {}),
  })
}
