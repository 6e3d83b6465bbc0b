import { formatMoney } from '../shared/money.js'
import { dayKeyOf } from '../shared/dates.js'
import type { BudgetUsage } from '../budgets/budget-evaluator.js'
import type { Expense, Investment } from '../records/record-types.js'
import type { ArtifactFormat, BreakdownEntry, MonthlySummary, TrendPoint } from './types.js'

export interface ArtifactContent {
  owner: string
  displayName: string
  summary: MonthlySummary
  /** Allocations of the report month only */
  budgets: BudgetUsage[]
  /** The month's records, newest first */
  expenses: Expense[]
  investments: Investment[]
  spendingTrend: TrendPoint[]
  currencySymbol: string
  generatedAt: Date
}

const formatGeneratedAt = (date: Date): string =>
  `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`

const section = (title: string, lines: string[], emptyLine: string): string[] => [
  title,
  ...(lines.length === 0 ? [`  ${emptyLine}`] : lines.map((line) => `  - ${line}`)),
]

const breakdownLines = <K extends string>(entries: BreakdownEntry<K>[], symbol: string): string[] =>
  entries.map((e) => `${e.key}: ${formatMoney(e.total, symbol)} (${e.percentOfTotal.toFixed(1)}%)`)

const budgetLines = (budgets: BudgetUsage[], symbol: string): string[] =>
  budgets.map((b) => {
    const usage = `${formatMoney(b.spent, symbol)} of ${formatMoney(b.allocated, symbol)} (${b.percentUsed.toFixed(1)}%)`
    return b.isOverBudget
      ? `${b.category}: ${usage}, over by ${formatMoney(-b.remaining, symbol)}`
      : `${b.category}: ${usage}, ${formatMoney(b.remaining, symbol)} left`
  })

const recordLines = (
  records: Array<{ occurredAt: string; label: string; amount: number; description: string }>,
  symbol: string
): string[] =>
  records.map(
    (r) => `${dayKeyOf(r.occurredAt)} ${r.label} ${formatMoney(r.amount, symbol)} ${r.description}`
  )

/**
 * Plain-text month report.
 *
 * @example
 * Spendly Monthly Report - 2024-03
 * User: Demo User
 * Monthly Salary: ₨5,000.00
 * ...
 * Report Generated: 2024-03-31 12:00:00 UTC
 */
export const renderTextArtifact = (content: ArtifactContent): string => {
  const { summary, currencySymbol: symbol } = content
  const lines = [
    `Spendly Monthly Report - ${summary.month}`,
    `User: ${content.displayName}`,
    `Monthly Salary: ${formatMoney(summary.totalIncome, symbol)}`,
    `Total Expenses: ${formatMoney(summary.totalExpenses, symbol)}`,
    `Total Investments: ${formatMoney(summary.totalInvestments, symbol)}`,
    `Total Savings: ${formatMoney(summary.totalSavings, symbol)}`,
    '',
    ...section(
      'Expenses by Category',
      breakdownLines(summary.expensesByCategory, symbol),
      'No expenses recorded.'
    ),
    '',
    ...section(
      'Investments by Type',
      breakdownLines(summary.investmentsByType, symbol),
      'No investments recorded.'
    ),
    '',
    ...section('Budgets', budgetLines(content.budgets, symbol), 'No budgets set for this month.'),
    '',
    ...section(
      'Expenses',
      recordLines(content.expenses.map((e) => ({ ...e, label: e.category })), symbol),
      'No expenses for this month.'
    ),
    '',
    ...section(
      'Investments',
      recordLines(content.investments.map((i) => ({ ...i, label: i.investmentType })), symbol),
      'No investments for this month.'
    ),
    '',
    ...section(
      'Spending Trend',
      content.spendingTrend.map((p) => `${p.month}: ${formatMoney(p.expenses, symbol)}`),
      'No months to show.'
    ),
    '',
    `Report Generated: ${formatGeneratedAt(content.generatedAt)}`,
  ]
  return `${lines.join('\n')}\n`
}

/**
 * JSON month report. Amounts stay in minor units.
 */
export const renderJsonArtifact = (content: ArtifactContent): string =>
  `${JSON.stringify(
    {
      month: content.summary.month,
      owner: content.owner,
      user: content.displayName,
      currencySymbol: content.currencySymbol,
      totals: {
        income: content.summary.totalIncome,
        expenses: content.summary.totalExpenses,
        investments: content.summary.totalInvestments,
        savings: content.summary.totalSavings,
      },
      expensesByCategory: content.summary.expensesByCategory,
      investmentsByType: content.summary.investmentsByType,
      budgets: content.budgets,
      expenses: content.expenses.map(({ id, category, amount, description, occurredAt }) => ({
        id,
        category,
        amount,
        description,
        occurredAt,
      })),
      investments: content.investments.map(
        ({ id, investmentType, amount, description, occurredAt }) => ({
          id,
          investmentType,
          amount,
          description,
          occurredAt,
        })
      ),
      spendingTrend: content.spendingTrend,
      generatedAt: content.generatedAt.toISOString(),
    },
    null,
    2
  )}\n`

export const renderArtifact = (format: ArtifactFormat, content: ArtifactContent): string =>
  format === 'json' ? renderJsonArtifact(content) : renderTextArtifact(content)

// `_` only ever opens or closes an escape, so distinct owners never share a name
const fileSafeOwner = (owner: string): string =>
  owner.replace(/[^A-Za-z0-9.-]/gu, (char) => `_${(char.codePointAt(0) ?? 0).toString(16)}_`)

/**
 * `monthly_report_<owner>_<month>.<txt|json>`. Characters of the owner
 * outside `[A-Za-z0-9.-]` become `_<hex code point>_`.
 *
 * @example
 * artifactFileName('a b', '2024-03', 'text') // => 'monthly_report_a_20_b_2024-03.txt'
 */
export const artifactFileName = (owner: string, month: string, format: ArtifactFormat): string =>
  `monthly_report_${fileSafeOwner(owner)}_${month}.${format === 'json' ? 'json' : 'txt'}`
