import { percentOf } from '../shared/money.js'
import type { Budget, Expense, ExpenseCategory } from '../records/record-types.js'

/**
 * Spending against one category allocation for one month.
 */
export interface BudgetUsage {
  category: ExpenseCategory
  month: string
  allocated: number
  spent: number
  /** allocated − spent, negative when over budget */
  remaining: number
  /** spent / allocated as a percentage (one decimal), 0 for a zero allocation */
  percentUsed: number
  isOverBudget: boolean
}

export type BudgetAllocation = Pick<Budget, 'category' | 'monthKey' | 'allocatedAmount'>

/**
 * Compares an allocation with the expenses of its category and month.
 * Expenses of other categories or months are ignored, so callers can pass
 * a whole month (or more) of records.
 *
 * @example
 * evaluateBudget({ category: 'Food', monthKey: '2024-03', allocatedAmount: 100000 }, expenses)
 * // => { spent: 120000, remaining: -20000, percentUsed: 120, isOverBudget: true, ... }
 */
export const evaluateBudget = (budget: BudgetAllocation, expenses: Expense[]): BudgetUsage => {
  const spent = expenses
    .filter((e) => e.category === budget.category && e.monthKey === budget.monthKey)
    .reduce((sum, e) => sum + e.amount, 0)

  return {
    category: budget.category,
    month: budget.monthKey,
    allocated: budget.allocatedAmount,
    spent,
    remaining: budget.allocatedAmount - spent,
    percentUsed: percentOf(spent, budget.allocatedAmount),
    isOverBudget: spent > budget.allocatedAmount,
  }
}
