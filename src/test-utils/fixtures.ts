import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createRecordStore, type RecordStore } from '../shared/record-store.js'
import { createRequestContext, type RequestContext } from '../shared/context.js'
import type { Expense, Investment, Profile } from '../records/record-types.js'
import type { AppConfig } from '../config/config-types.js'

export const TEST_NOW = new Date('2024-03-31T12:00:00.000Z')

/**
 * In-memory SQLite store with a fixed clock
 */
export const createTestStore = (now: Date = TEST_NOW): RecordStore =>
  createRecordStore(':memory:', { now: () => now })

export const createTestContext = (owner = 'alice'): RequestContext => createRequestContext(owner)

/**
 * Fresh temp directory for report artifacts. Call the returned cleanup in afterEach.
 */
export const createTempDir = (prefix = 'spendly-test-'): { dir: string; cleanup: () => void } => {
  const dir = mkdtempSync(join(tmpdir(), prefix))
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) }
}

/**
 * Creates a mock Expense with sensible defaults
 */
export const createMockExpense = (overrides: Partial<Expense> = {}): Expense => ({
  id: 1,
  owner: 'alice',
  category: 'Food',
  amount: 1000, // 10.00
  description: 'Test expense',
  occurredAt: '2024-03-10T00:00:00.000Z',
  monthKey: '2024-03',
  createdAt: '2024-03-10T00:00:00.000Z',
  ...overrides,
})

/**
 * Creates a mock Investment
 */
export const createMockInvestment = (overrides: Partial<Investment> = {}): Investment => ({
  id: 1,
  owner: 'alice',
  investmentType: 'Stocks',
  amount: 10000, // 100.00
  description: 'Test investment',
  occurredAt: '2024-03-12T00:00:00.000Z',
  monthKey: '2024-03',
  createdAt: '2024-03-12T00:00:00.000Z',
  ...overrides,
})

export const createMockProfile = (overrides: Partial<Profile> = {}): Profile => ({
  owner: 'alice',
  fullName: 'Alice Example',
  monthlySalary: 500000, // 5,000.00
  phoneNumber: '',
  dateOfBirth: null,
  address: '',
  createdAt: TEST_NOW.toISOString(),
  updatedAt: TEST_NOW.toISOString(),
  ...overrides,
})

export const createMockConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  owner: { username: 'alice' },
  storage: { databasePath: ':memory:', reportsDir: '/tmp/spendly-reports' },
  currency: { code: 'PKR', symbol: '₨' },
  report: { artifactFormat: 'text' },
  display: { recentLimit: 5, trendMonths: 6 },
  ...overrides,
})
