import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { buildDashboard } from '../dashboard.js'
import { addExpense, addInvestment } from '../../records/record-service.js'
import { setBudget } from '../../budgets/budget-service.js'
import { updateProfile } from '../../profile/profile-service.js'
import type { RecordStore } from '../../shared/record-store.js'
import { createTestContext, createTestStore } from '../../test-utils/fixtures.js'

describe('buildDashboard', () => {
  let store: RecordStore
  const ctx = createTestContext()
  const options = { month: '2024-03', recentLimit: 5, trendMonths: 6 }

  beforeEach(() => {
    store = createTestStore()
  })

  afterEach(() => {
    store.close()
  })

  it('summarizes salary, spending and savings for the month', () => {
    updateProfile(store, ctx, { fullName: 'Alice Example', monthlySalary: '5000' })
    addExpense(store, ctx, { category: 'Food', amount: '1200', description: 'Groceries', occurredAt: '2024-03-15' })
    addInvestment(store, ctx, { investmentType: 'Stocks', amount: '800', description: 'ETF', occurredAt: '2024-03-20' })

    const dashboard = buildDashboard(store, ctx, options)

    expect(dashboard.displayName).toBe('Alice Example')
    expect(dashboard.summary).toMatchObject({
      totalIncome: 500000,
      totalExpenses: 120000,
      totalInvestments: 80000,
      totalSavings: 300000,
    })
    expect(dashboard.recentExpenses.map((e) => e.description)).toEqual(['Groceries'])
    expect(dashboard.recentInvestments.map((i) => i.description)).toEqual(['ETF'])
  })

  it('shows budget usage for the month when it has allocations', () => {
    setBudget(store, ctx, { category: 'Food', monthKey: '2024-03', allocatedAmount: '1000' })
    addExpense(store, ctx, { category: 'Food', amount: '1200', description: 'Groceries', occurredAt: '2024-03-15' })

    const dashboard = buildDashboard(store, ctx, options)

    expect(dashboard.budgetMonth).toBe('2024-03')
    expect(dashboard.budgets).toEqual([
      {
        category: 'Food',
        month: '2024-03',
        allocated: 100000,
        spent: 120000,
        remaining: -20000,
        percentUsed: 120,
        isOverBudget: true,
      },
    ])
  })

  it('falls back to the latest month with allocations', () => {
    setBudget(store, ctx, { category: 'Bills', monthKey: '2024-01', allocatedAmount: '100' })
    setBudget(store, ctx, { category: 'Food', monthKey: '2024-02', allocatedAmount: '200' })

    const dashboard = buildDashboard(store, ctx, options)

    expect(dashboard.budgetMonth).toBe('2024-02')
    expect(dashboard.budgets.map((b) => b.category)).toEqual(['Food'])
  })

  it('has no budget section without any allocation', () => {
    const dashboard = buildDashboard(store, ctx, options)

    expect(dashboard.budgetMonth).toBeNull()
    expect(dashboard.budgets).toEqual([])
    expect(dashboard.displayName).toBe('alice')
  })

  it('builds the spending trend oldest first', () => {
    addExpense(store, ctx, { category: 'Food', amount: '10', description: 'Jan', occurredAt: '2024-01-10' })
    addExpense(store, ctx, { category: 'Food', amount: '30', description: 'Mar', occurredAt: '2024-03-10' })

    const dashboard = buildDashboard(store, ctx, { ...options, trendMonths: 3 })

    expect(dashboard.spendingTrend).toEqual([
      { month: '2024-01', expenses: 1000 },
      { month: '2024-02', expenses: 0 },
      { month: '2024-03', expenses: 3000 },
    ])
  })

  it('limits recent records', () => {
    for (let day = 1; day <= 4; day++) {
      addExpense(store, ctx, {
        category: 'Food',
        amount: String(day),
        description: `Day ${day}`,
        occurredAt: `2024-03-0${day}`,
      })
    }

    const dashboard = buildDashboard(store, ctx, { ...options, recentLimit: 2 })

    expect(dashboard.recentExpenses.map((e) => e.description)).toEqual(['Day 4', 'Day 3'])
  })
})
