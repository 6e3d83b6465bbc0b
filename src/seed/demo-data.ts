import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { currentMonth, shiftMonth } from '../shared/dates.js'
import { EXPENSE_CATEGORIES, INVESTMENT_TYPES } from '../records/record-types.js'
import { getOrCreateProfile } from '../profile/profile-service.js'
import { generateMonthlyReport } from '../reporting/report-generator.js'
import type { ArtifactFormat } from '../reporting/types.js'

const DEMO_SALARY = 520000
const DEMO_NAME = 'Demo User'
const DEMO_BUDGET = 50000
const SEED_MONTHS = 12

export interface SeedOptions {
  now?: Date
  reportsDir: string
  format?: ArtifactFormat
  currencySymbol: string
}

export interface SeedResult {
  owner: string
  months: string[]
  expensesCreated: number
  investmentsCreated: number
  budgetsSet: number
  reportsGenerated: number
}

const dayOf = (month: string, day: number): string =>
  `${month}-${String(day).padStart(2, '0')}T00:00:00.000Z`

/**
 * Fills an owner's account with a year of sample data ending at `now`.
 * Salary and name are only set when still empty. Running it twice adds a
 * second set of records but keeps one budget and one report per key.
 */
export const seedDemoData = (
  store: RecordStore,
  ctx: RequestContext,
  options: SeedOptions
): SeedResult => {
  const now = options.now ?? new Date()
  const owner = ctx.ownerId
  const thisMonth = currentMonth(now)
  // m = 0 is the current month, m = 11 the oldest
  const months = Array.from({ length: SEED_MONTHS }, (_, m) => shiftMonth(thisMonth, -m))

  const counts = store.transaction(() => {
    const profile = getOrCreateProfile(store, ctx, now)
    store.saveProfile({
      ...profile,
      monthlySalary: profile.monthlySalary || DEMO_SALARY,
      fullName: profile.fullName || DEMO_NAME,
      updatedAt: now.toISOString(),
    })

    let expensesCreated = 0
    let investmentsCreated = 0
    months.forEach((month, m) => {
      EXPENSE_CATEGORIES.slice(0, 5).forEach((category, i) => {
        store.insertExpense(owner, {
          category,
          amount: (50 + 20 * i + 5 * m) * 100,
          description: `Demo ${category} expense`,
          occurredAt: dayOf(month, 5 + i),
        })
        expensesCreated++
      })

      if (m % 2 === 0) {
        INVESTMENT_TYPES.slice(0, 2).forEach((investmentType, j) => {
          store.insertInvestment(owner, {
            investmentType,
            amount: (100 + 150 * j + 10 * m) * 100,
            description: `Demo ${investmentType} investment`,
            occurredAt: dayOf(month, 10 + j),
          })
          investmentsCreated++
        })
      }
    })

    const budgets = EXPENSE_CATEGORIES.slice(0, 6).map((category) =>
      store.upsertBudget(owner, { category, monthKey: thisMonth, allocatedAmount: DEMO_BUDGET })
    )

    return { expensesCreated, investmentsCreated, budgetsSet: budgets.length }
  })

  const reports = months.map((month) =>
    generateMonthlyReport(store, ctx, {
      month,
      reportsDir: options.reportsDir,
      format: options.format ?? 'text',
      currencySymbol: options.currencySymbol,
      now,
    })
  )

  return { owner, months, ...counts, reportsGenerated: reports.length }
}
