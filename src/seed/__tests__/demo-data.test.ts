import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readdirSync } from 'node:fs'
import { seedDemoData } from '../demo-data.js'
import { updateProfile } from '../../profile/profile-service.js'
import type { RecordStore } from '../../shared/record-store.js'
import {
  createTempDir,
  createTestContext,
  createTestStore,
  TEST_NOW,
} from '../../test-utils/fixtures.js'

describe('seedDemoData', () => {
  let store: RecordStore
  let tmp: { dir: string; cleanup: () => void }
  const ctx = createTestContext()

  beforeEach(() => {
    store = createTestStore()
    tmp = createTempDir()
  })

  afterEach(() => {
    store.close()
    tmp.cleanup()
  })

  const seed = () =>
    seedDemoData(store, ctx, { now: TEST_NOW, reportsDir: tmp.dir, currencySymbol: '₨' })

  it('creates a year of records, budgets and reports', () => {
    const result = seed()

    expect(result).toMatchObject({
      owner: 'alice',
      expensesCreated: 60,
      investmentsCreated: 12,
      budgetsSet: 6,
      reportsGenerated: 12,
    })
    expect(result.months[0]).toBe('2024-03')
    expect(result.months[11]).toBe('2023-04')
    expect(store.countReports('alice')).toBe(12)
    expect(readdirSync(tmp.dir)).toHaveLength(12)
  })

  it('fills in an empty profile', () => {
    seed()

    expect(store.getProfile('alice')).toMatchObject({
      fullName: 'Demo User',
      monthlySalary: 520000,
    })
  })

  it('keeps an existing salary', () => {
    updateProfile(store, ctx, { monthlySalary: '3000' })

    seed()

    expect(store.getProfile('alice')?.monthlySalary).toBe(300000)
  })

  it('grows amounts month by month', () => {
    seed()

    const march = store.listExpensesForMonth('alice', '2024-03')
    const february = store.listExpensesForMonth('alice', '2024-02')

    expect(march.find((e) => e.category === 'Food')).toMatchObject({
      amount: 5000,
      occurredAt: '2024-03-05T00:00:00.000Z',
    })
    expect(february.find((e) => e.category === 'Entertainment')).toMatchObject({
      amount: 13500,
      occurredAt: '2024-02-09T00:00:00.000Z',
    })
    expect(store.listInvestmentsForMonth('alice', '2024-02')).toEqual([])
  })

  it('stores a report matching the current month', () => {
    seed()

    expect(store.getReport('alice', '2024-03')).toMatchObject({
      totalIncome: 520000,
      totalExpenses: 45000,
      totalInvestments: 35000,
      totalSavings: 440000,
    })
    expect(store.listBudgetsForMonth('alice', '2024-03').map((b) => b.allocatedAmount)).toEqual([
      50000, 50000, 50000, 50000, 50000, 50000,
    ])
  })
})
