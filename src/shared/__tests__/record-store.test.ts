import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { RecordStore } from '../record-store.js'
import { createTestStore, TEST_NOW } from '../../test-utils/fixtures.js'

const expense = (occurredAt: string, amount = 1000, description = 'Groceries') => ({
  category: 'Food' as const,
  amount,
  description,
  occurredAt,
})

describe('createRecordStore', () => {
  let store: RecordStore

  beforeEach(() => {
    store = createTestStore()
  })

  afterEach(() => {
    store.close()
  })

  describe('month keys', () => {
    it('derives the month key from occurredAt on insert', () => {
      const saved = store.insertExpense('alice', expense('2024-03-31T23:30:00.000Z'))

      expect(saved.monthKey).toBe('2024-03')
      expect(saved.createdAt).toBe(TEST_NOW.toISOString())
    })

    it('normalizes offsets to UTC before bucketing', () => {
      const saved = store.insertExpense('alice', expense('2024-04-01T01:00:00+02:00'))

      expect(saved.occurredAt).toBe('2024-03-31T23:00:00.000Z')
      expect(saved.monthKey).toBe('2024-03')
    })

    it('moves the record to the new month when the date changes', () => {
      const saved = store.insertExpense('alice', expense('2024-03-31T23:30:00.000Z'))
      const updated = store.updateExpense('alice', saved.id, expense('2024-04-02T00:00:00.000Z'))

      expect(updated?.monthKey).toBe('2024-04')
      expect(store.listExpensesForMonth('alice', '2024-03')).toEqual([])
      expect(store.listExpensesForMonth('alice', '2024-04').map((e) => e.id)).toEqual([saved.id])
    })

    it('applies to investments too', () => {
      const saved = store.insertInvestment('alice', {
        investmentType: 'Crypto',
        amount: 5000,
        description: 'Coins',
        occurredAt: '2023-12-31T22:00:00.000Z',
      })

      expect(saved.investmentType).toBe('Crypto')
      expect(saved.monthKey).toBe('2023-12')
    })
  })

  describe('owner scoping', () => {
    it('hides and protects other owners records', () => {
      const saved = store.insertExpense('alice', expense('2024-03-10'))

      expect(store.getExpense('bob', saved.id)).toBeNull()
      expect(store.updateExpense('bob', saved.id, expense('2024-03-11'))).toBeNull()
      expect(store.deleteExpense('bob', saved.id)).toBe(false)
      expect(store.listExpenses('bob')).toEqual([])
      expect(store.getExpense('alice', saved.id)?.occurredAt).toBe('2024-03-10T00:00:00.000Z')
    })
  })

  describe('listExpenses', () => {
    beforeEach(() => {
      store.insertExpense('alice', expense('2024-03-01', 100, 'Morning coffee'))
      store.insertExpense('alice', expense('2024-03-15', 200, 'Weekly groceries'))
      store.insertExpense('alice', { ...expense('2024-03-31T23:59:00.000Z', 300, 'Bus pass'), category: 'Transport' })
    })

    it('returns newest first', () => {
      expect(store.listExpenses('alice').map((e) => e.amount)).toEqual([300, 200, 100])
    })

    it('filters by category', () => {
      expect(store.listExpenses('alice', { label: 'Transport' }).map((e) => e.amount)).toEqual([300])
    })

    it('treats from and to as inclusive days', () => {
      const result = store.listExpenses('alice', { from: '2024-03-15', to: '2024-03-31' })
      expect(result.map((e) => e.amount)).toEqual([300, 200])
    })

    it('searches descriptions case-insensitively', () => {
      expect(store.listExpenses('alice', { search: 'COFFEE' }).map((e) => e.amount)).toEqual([100])
    })

    it('limits recent records', () => {
      expect(store.listRecentExpenses('alice', 2).map((e) => e.amount)).toEqual([300, 200])
    })
  })

  describe('budgets', () => {
    it('keeps one row per owner, category and month', () => {
      const first = store.upsertBudget('alice', { category: 'Food', monthKey: '2024-03', allocatedAmount: 100000 })
      const second = store.upsertBudget('alice', { category: 'Food', monthKey: '2024-03', allocatedAmount: 80000 })

      expect(second.id).toBe(first.id)
      expect(store.listBudgetsForMonth('alice', '2024-03')).toHaveLength(1)
      expect(store.getBudget('alice', 'Food', '2024-03')?.allocatedAmount).toBe(80000)
    })

    it('finds the latest month with budgets', () => {
      expect(store.latestBudgetMonth('alice')).toBeNull()

      store.upsertBudget('alice', { category: 'Food', monthKey: '2024-03', allocatedAmount: 1 })
      store.upsertBudget('alice', { category: 'Bills', monthKey: '2024-04', allocatedAmount: 1 })
      store.upsertBudget('bob', { category: 'Bills', monthKey: '2024-09', allocatedAmount: 1 })

      expect(store.latestBudgetMonth('alice')).toBe('2024-04')
    })
  })

  describe('reports', () => {
    const snapshot = {
      owner: 'alice',
      monthKey: '2024-03',
      totalIncome: 500000,
      totalExpenses: 120000,
      totalInvestments: 80000,
      totalSavings: 300000,
      artifactPath: '/reports/monthly_report_alice_2024-03.txt',
      generatedAt: TEST_NOW.toISOString(),
    }

    it('replaces the snapshot for the same month', () => {
      const first = store.saveReport(snapshot)
      const second = store.saveReport({ ...snapshot, totalExpenses: 150000, totalSavings: 270000 })

      expect(second.id).toBe(first.id)
      expect(store.countReports('alice')).toBe(1)
      expect(store.getReport('alice', '2024-03')?.totalSavings).toBe(270000)
    })

    it('lists newest month first', () => {
      store.saveReport(snapshot)
      store.saveReport({ ...snapshot, monthKey: '2024-04' })

      expect(store.listReports('alice').map((r) => r.monthKey)).toEqual(['2024-04', '2024-03'])
    })
  })

  describe('transaction', () => {
    it('rolls back every write when the callback throws', () => {
      expect(() =>
        store.transaction(() => {
          store.insertExpense('alice', expense('2024-03-10'))
          throw new Error('boom')
        })
      ).toThrow('boom')

      expect(store.listExpenses('alice')).toEqual([])
    })
  })
})
