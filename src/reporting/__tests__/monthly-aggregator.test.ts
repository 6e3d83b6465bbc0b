import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { aggregateMonth, buildBreakdown, summarizeMonth } from '../monthly-aggregator.js'
import { addExpense, addInvestment } from '../../records/record-service.js'
import { updateProfile } from '../../profile/profile-service.js'
import { ValidationError } from '../../shared/errors.js'
import type { RecordStore } from '../../shared/record-store.js'
import {
  createMockExpense,
  createMockInvestment,
  createTestContext,
  createTestStore,
} from '../../test-utils/fixtures.js'

describe('buildBreakdown', () => {
  it('merges repeated keys and sorts by total, then key', () => {
    const breakdown = buildBreakdown([
      { key: 'Food', total: 3000, count: 1 },
      { key: 'Transport', total: 2000, count: 1 },
      { key: 'Bills', total: 4000, count: 1 },
      { key: 'Food', total: 1000, count: 1 },
    ])

    expect(breakdown).toEqual([
      { key: 'Bills', total: 4000, count: 1, percentOfTotal: 40 },
      { key: 'Food', total: 4000, count: 2, percentOfTotal: 40 },
      { key: 'Transport', total: 2000, count: 1, percentOfTotal: 20 },
    ])
  })

  it('is empty for no items', () => {
    expect(buildBreakdown([])).toEqual([])
  })
})

describe('aggregateMonth', () => {
  it('returns zeros for an empty month without salary', () => {
    expect(aggregateMonth({ month: '2024-03', expenses: [], investments: [] })).toEqual({
      month: '2024-03',
      totalIncome: 0,
      totalExpenses: 0,
      totalInvestments: 0,
      totalSavings: 0,
      expenseCount: 0,
      investmentCount: 0,
      expensesByCategory: [],
      investmentsByType: [],
    })
  })

  it('sums exactly without floating point drift', () => {
    const summary = aggregateMonth({
      month: '2024-03',
      expenses: [createMockExpense({ id: 1, amount: 10 }), createMockExpense({ id: 2, amount: 20 })],
      investments: [],
      monthlySalary: 30,
    })

    expect(summary.totalExpenses).toBe(30)
    expect(summary.totalSavings).toBe(0)
  })

  it('ignores records from other months', () => {
    const summary = aggregateMonth({
      month: '2024-03',
      expenses: [
        createMockExpense({ amount: 1000 }),
        createMockExpense({ amount: 5000, monthKey: '2024-04', occurredAt: '2024-04-01T00:00:00.000Z' }),
      ],
      investments: [createMockInvestment({ amount: 7000, monthKey: '2024-02' })],
      monthlySalary: 10000,
    })

    expect(summary).toMatchObject({
      totalIncome: 10000,
      totalExpenses: 1000,
      totalInvestments: 0,
      totalSavings: 9000,
      expenseCount: 1,
      investmentCount: 0,
    })
  })

  it('lets savings go negative', () => {
    const summary = aggregateMonth({
      month: '2024-03',
      expenses: [createMockExpense({ amount: 8000 })],
      investments: [createMockInvestment({ amount: 4000 })],
      monthlySalary: 10000,
    })

    expect(summary.totalSavings).toBe(-2000)
  })
})

describe('summarizeMonth', () => {
  let store: RecordStore
  const ctx = createTestContext()

  beforeEach(() => {
    store = createTestStore()
  })

  afterEach(() => {
    store.close()
  })

  it('combines salary, expenses and investments for the month', () => {
    updateProfile(store, ctx, { monthlySalary: '5000' })
    addExpense(store, ctx, { category: 'Food', amount: '1200', description: 'Groceries', occurredAt: '2024-03-15' })
    addInvestment(store, ctx, { investmentType: 'Stocks', amount: '800', description: 'ETF', occurredAt: '2024-03-20' })

    const summary = summarizeMonth(store, ctx, '2024-03')

    expect(summary).toMatchObject({
      totalIncome: 500000,
      totalExpenses: 120000,
      totalInvestments: 80000,
      totalSavings: 300000,
    })
    expect(summary.expensesByCategory).toEqual([
      { key: 'Food', total: 120000, count: 1, percentOfTotal: 100 },
    ])
    expect(summary.investmentsByType).toEqual([
      { key: 'Stocks', total: 80000, count: 1, percentOfTotal: 100 },
    ])
  })

  it('treats a missing profile as zero income', () => {
    addExpense(store, ctx, { category: 'Food', amount: '10', description: 'Snack', occurredAt: '2024-03-15' })

    expect(summarizeMonth(store, ctx, '2024-03')).toMatchObject({
      totalIncome: 0,
      totalExpenses: 1000,
      totalSavings: -1000,
    })
  })

  it('rejects malformed months', () => {
    expect(() => summarizeMonth(store, ctx, '2024-3')).toThrow(ValidationError)
  })
})
