import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { ValidationError, type FieldErrors } from '../shared/errors.js'
import { EXPENSE_CATEGORIES, type Budget, type BudgetInput } from '../records/record-types.js'
import { assertMonthKey, validateBudgetInput } from '../records/record-validation.js'
import { evaluateBudget, type BudgetUsage } from './budget-evaluator.js'

export interface BudgetOverviewRow extends BudgetUsage {
  /** False when the category has no allocation for the month (allocated is then 0) */
  hasBudget: boolean
}

/**
 * Creates or replaces the allocation for a category and month.
 */
export const setBudget = (store: RecordStore, ctx: RequestContext, raw: unknown): Budget => {
  const result = validateBudgetInput(raw)
  if (!result.success) {
    throw new ValidationError('Invalid budget', result.fieldErrors)
  }
  return store.upsertBudget(ctx.ownerId, result.data)
}

/**
 * Sets several allocations for one month. Every entry is validated before
 * anything is written; the writes share one transaction.
 *
 * @example
 * setBudgets(store, ctx, '2024-03', { Food: '1000', Bills: 450 })
 */
export const setBudgets = (
  store: RecordStore,
  ctx: RequestContext,
  month: string,
  allocations: Record<string, string | number>
): Budget[] => {
  assertMonthKey(month)

  const inputs: BudgetInput[] = []
  const fieldErrors: FieldErrors = {}
  for (const [category, allocatedAmount] of Object.entries(allocations)) {
    const result = validateBudgetInput({ category, monthKey: month, allocatedAmount })
    if (result.success) {
      inputs.push(result.data)
    } else {
      fieldErrors[category] = Object.values(result.fieldErrors).flat()
    }
  }

  if (Object.keys(fieldErrors).length > 0) {
    throw new ValidationError('Invalid budget allocations', fieldErrors)
  }

  return store.transaction(() => inputs.map((input) => store.upsertBudget(ctx.ownerId, input)))
}

/**
 * Usage of every allocation the owner has for the month, in category order.
 */
export const budgetUsageForMonth = (
  store: RecordStore,
  ctx: RequestContext,
  month: string
): BudgetUsage[] => {
  assertMonthKey(month)
  return store
    .listBudgetsForMonth(ctx.ownerId, month)
    .map((budget) =>
      evaluateBudget(
        budget,
        store.listExpensesForCategoryMonth(ctx.ownerId, budget.category, month)
      )
    )
}

/**
 * One row per expense category. Categories without an allocation show
 * allocated 0 with whatever was spent.
 */
export const budgetOverview = (
  store: RecordStore,
  ctx: RequestContext,
  month: string
): BudgetOverviewRow[] => {
  assertMonthKey(month)
  return EXPENSE_CATEGORIES.map((category) => {
    const budget = store.getBudget(ctx.ownerId, category, month)
    const expenses = store.listExpensesForCategoryMonth(ctx.ownerId, category, month)
    const usage = evaluateBudget(
      budget ?? { category, monthKey: month, allocatedAmount: 0 },
      expenses
    )
    return { ...usage, hasBudget: budget !== null }
  })
}
