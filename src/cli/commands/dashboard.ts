import type { MonthOptions } from '../args.js'
import { createFormatter, formatPercent, formatTable } from '../output.js'
import { resolveMonth, type CommandContext } from './command-context.js'
import { formatMoney } from '../../shared/money.js'
import { dayKeyOf } from '../../shared/dates.js'
import { buildDashboard, type DashboardSummary } from '../../reporting/index.js'
import type { BudgetUsage } from '../../budgets/budget-evaluator.js'

const divider = '─'.repeat(60)

/**
 * OVER past the allocation, WARN above 80%, otherwise OK.
 */
export const budgetStatus = (usage: Pick<BudgetUsage, 'isOverBudget' | 'percentUsed'>): string =>
  usage.isOverBudget ? 'OVER' : usage.percentUsed > 80 ? 'WARN' : 'OK'

/**
 * Generates the dashboard for terminal display.
 */
export const formatTextDashboard = (dashboard: DashboardSummary, symbol: string): string => {
  const { summary } = dashboard
  const money = (value: number) => formatMoney(value, symbol)
  const lines: string[] = []

  lines.push('')
  lines.push(`  Dashboard: ${dashboard.month}`)
  lines.push(`  User: ${dashboard.displayName}`)
  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push(`  Income:         ${money(summary.totalIncome)}`)
  lines.push(`  Expenses:       ${money(summary.totalExpenses)}`)
  lines.push(`  Investments:    ${money(summary.totalInvestments)}`)
  lines.push(`  Savings:        ${money(summary.totalSavings)}`)

  lines.push('')
  lines.push(divider)
  lines.push('')
  if (!dashboard.budgetMonth) {
    lines.push('  BUDGETS')
    lines.push('')
    lines.push('  No budgets set yet.')
  } else {
    lines.push(`  BUDGETS (${dashboard.budgetMonth})`)
    lines.push('')
    lines.push(
      formatTable(
        ['Category', 'Allocated', 'Spent', 'Remaining', 'Used', 'Status'],
        dashboard.budgets.map((b) => [
          b.category,
          money(b.allocated),
          money(b.spent),
          money(b.remaining),
          formatPercent(b.percentUsed),
          budgetStatus(b),
        ]),
        { alignRight: [1, 2, 3, 4] }
      )
    )
  }

  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  SPENDING TREND')
  lines.push('')
  lines.push(
    formatTable(
      ['Month', 'Expenses'],
      dashboard.spendingTrend.map((p) => [p.month, money(p.expenses)]),
      { alignRight: [1] }
    )
  )

  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  RECENT EXPENSES')
  lines.push('')
  if (dashboard.recentExpenses.length === 0) {
    lines.push('  No expenses recorded.')
  } else {
    lines.push(
      formatTable(
        ['ID', 'Date', 'Category', 'Amount', 'Description'],
        dashboard.recentExpenses.map((e) => [
          String(e.id),
          dayKeyOf(e.occurredAt),
          e.category,
          money(e.amount),
          e.description.slice(0, 30),
        ]),
        { alignRight: [3] }
      )
    )
  }

  lines.push('')
  lines.push('  RECENT INVESTMENTS')
  lines.push('')
  if (dashboard.recentInvestments.length === 0) {
    lines.push('  No investments recorded.')
  } else {
    lines.push(
      formatTable(
        ['ID', 'Date', 'Type', 'Amount', 'Description'],
        dashboard.recentInvestments.map((i) => [
          String(i.id),
          dayKeyOf(i.occurredAt),
          i.investmentType,
          money(i.amount),
          i.description.slice(0, 30),
        ]),
        { alignRight: [3] }
      )
    )
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * @example
 * spendly dashboard --month 2024-03 --format text
 */
export const dashboardCommand = (options: MonthOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { config, store, ctx, now } = context
  const month = resolveMonth(options.month, now)

  formatter.progress(`Building dashboard for ${month}...`)

  const dashboard = buildDashboard(store, ctx, {
    month,
    recentLimit: config.display.recentLimit,
    trendMonths: config.display.trendMonths,
  })

  formatter.success({
    success: true,
    dashboard,
    ...(options.format === 'text'
      ? { formatted: formatTextDashboard(dashboard, config.currency.symbol) }
      : {}),
  })
}
