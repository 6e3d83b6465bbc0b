import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { assertMonthKey } from '../records/record-validation.js'
import { budgetUsageForMonth } from '../budgets/budget-service.js'
import { displayName } from '../profile/profile-service.js'
import { spendingTrend, summarizeMonth } from './monthly-aggregator.js'
import type { DashboardOptions, DashboardSummary } from './types.js'

/**
 * Everything the dashboard shows for one month. When the month has no
 * budgets, budget usage comes from the latest month that has some.
 */
export const buildDashboard = (
  store: RecordStore,
  ctx: RequestContext,
  options: DashboardOptions
): DashboardSummary => {
  const month = assertMonthKey(options.month)
  const owner = ctx.ownerId
  const summary = summarizeMonth(store, ctx, month)

  const budgetMonth =
    store.listBudgetsForMonth(owner, month).length > 0 ? month : store.latestBudgetMonth(owner)

  return {
    owner,
    displayName: displayName(store.getProfile(owner), owner),
    month,
    summary,
    budgetMonth,
    budgets: budgetMonth ? budgetUsageForMonth(store, ctx, budgetMonth) : [],
    spendingTrend: spendingTrend(store, ctx, month, options.trendMonths),
    recentExpenses: store.listRecentExpenses(owner, options.recentLimit),
    recentInvestments: store.listRecentInvestments(owner, options.recentLimit),
  }
}
