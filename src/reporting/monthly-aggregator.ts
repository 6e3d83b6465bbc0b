/**
 * Monthly aggregation.
 *
 * Totals are exact integer sums of minor units. Income is the owner's
 * current monthly salary; savings is what is left after expenses and
 * investments and may go negative.
 */

import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { percentOf } from '../shared/money.js'
import { monthWindow } from '../shared/dates.js'
import { assertMonthKey } from '../records/record-validation.js'
import type { ExpenseCategory, InvestmentType } from '../records/record-types.js'
import type { AggregatorInput, BreakdownEntry, MonthlySummary, TrendPoint } from './types.js'

/**
 * Folds keyed partial totals into a breakdown sorted by total (highest
 * first, ties by key). The same key may appear many times.
 */
export const buildBreakdown = <K extends string>(
  items: Iterable<{ key: K; total: number; count: number }>
): BreakdownEntry<K>[] => {
  const byKey = new Map<K, { total: number; count: number }>()
  for (const item of items) {
    const current = byKey.get(item.key) ?? { total: 0, count: 0 }
    byKey.set(item.key, { total: current.total + item.total, count: current.count + item.count })
  }

  const grandTotal = [...byKey.values()].reduce((sum, entry) => sum + entry.total, 0)

  return [...byKey.entries()]
    .map(([key, { total, count }]) => ({
      key,
      total,
      count,
      percentOfTotal: percentOf(total, grandTotal),
    }))
    .sort((a, b) => b.total - a.total || a.key.localeCompare(b.key))
}

/**
 * Pure aggregation of one month. Records outside `month` are ignored.
 *
 * @example
 * aggregateMonth({ month: '2024-03', expenses, investments, monthlySalary: 500000 })
 * // => { totalIncome: 500000, totalExpenses: 120000, totalInvestments: 80000, totalSavings: 300000, ... }
 */
export const aggregateMonth = (input: AggregatorInput): MonthlySummary => {
  const expenses = input.expenses.filter((e) => e.monthKey === input.month)
  const investments = input.investments.filter((i) => i.monthKey === input.month)

  const totalIncome = input.monthlySalary ?? 0
  const totalExpenses = expenses.reduce((sum, e) => sum + e.amount, 0)
  const totalInvestments = investments.reduce((sum, i) => sum + i.amount, 0)

  return {
    month: input.month,
    totalIncome,
    totalExpenses,
    totalInvestments,
    totalSavings: totalIncome - totalExpenses - totalInvestments,
    expenseCount: expenses.length,
    investmentCount: investments.length,
    expensesByCategory: buildBreakdown<ExpenseCategory>(
      expenses.map((e) => ({ key: e.category, total: e.amount, count: 1 }))
    ),
    investmentsByType: buildBreakdown<InvestmentType>(
      investments.map((i) => ({ key: i.investmentType, total: i.amount, count: 1 }))
    ),
  }
}

/**
 * Loads one owner's month from the store and aggregates it. An owner
 * without a profile has no income.
 */
export const summarizeMonth = (
  store: RecordStore,
  ctx: RequestContext,
  month: string
): MonthlySummary => {
  assertMonthKey(month)
  return aggregateMonth({
    month,
    expenses: store.listExpensesForMonth(ctx.ownerId, month),
    investments: store.listInvestmentsForMonth(ctx.ownerId, month),
    monthlySalary: store.getProfile(ctx.ownerId)?.monthlySalary,
  })
}

/**
 * Expense totals of the `size` months ending at `month`, oldest first.
 */
export const spendingTrend = (
  store: RecordStore,
  ctx: RequestContext,
  month: string,
  size: number
): TrendPoint[] =>
  monthWindow(assertMonthKey(month), size).map((m) => ({
    month: m,
    expenses: summarizeMonth(store, ctx, m).totalExpenses,
  }))
