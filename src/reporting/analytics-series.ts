import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { monthWindow } from '../shared/dates.js'
import { percentOf } from '../shared/money.js'
import { assertMonthKey } from '../records/record-validation.js'
import { buildBreakdown, summarizeMonth } from './monthly-aggregator.js'
import type { AnalyticsSeries, MonthlySummary, SeriesPoint } from './types.js'

export const ANALYTICS_WINDOW_MONTHS = 12

/**
 * Builds the series from one summary per month, oldest first.
 */
export const buildSeries = (referenceMonth: string, summaries: MonthlySummary[]): AnalyticsSeries => {
  const points: SeriesPoint[] = summaries.map((s) => ({
    month: s.month,
    income: s.totalIncome,
    expenses: s.totalExpenses,
    investments: s.totalInvestments,
    savings: s.totalSavings,
  }))

  const totals = points.reduce(
    (acc, p) => ({
      income: acc.income + p.income,
      expenses: acc.expenses + p.expenses,
      investments: acc.investments + p.investments,
      savings: acc.savings + p.savings,
    }),
    { income: 0, expenses: 0, investments: 0, savings: 0 }
  )

  return {
    referenceMonth,
    months: points.map((p) => p.month),
    points,
    totals,
    expensesByCategory: buildBreakdown(summaries.flatMap((s) => s.expensesByCategory)),
    investmentsByType: buildBreakdown(summaries.flatMap((s) => s.investmentsByType)),
    savingsRate: percentOf(totals.savings, totals.income),
  }
}

/**
 * The 12 months ending at `referenceMonth`. Months without records still
 * get a point, carrying only the salary as income.
 */
export const buildAnalyticsSeries = (
  store: RecordStore,
  ctx: RequestContext,
  referenceMonth: string
): AnalyticsSeries => {
  assertMonthKey(referenceMonth)
  const summaries = monthWindow(referenceMonth, ANALYTICS_WINDOW_MONTHS).map((month) =>
    summarizeMonth(store, ctx, month)
  )
  return buildSeries(referenceMonth, summaries)
}
