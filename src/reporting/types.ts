/**
 * Types for the monthly aggregation and report engine.
 *
 * All monetary values are integer minor units (100 = 1.00).
 */

import type {
  Expense,
  ExpenseCategory,
  Investment,
  InvestmentType,
  MonthlyReport,
} from '../records/record-types.js'
import type { BudgetUsage } from '../budgets/budget-evaluator.js'

/**
 * One key of a breakdown (an expense category or an investment type).
 *
 * @example
 * const food: BreakdownEntry<ExpenseCategory> = {
 *   key: 'Food',
 *   total: 120000, // 1,200.00
 *   count: 3,
 *   percentOfTotal: 60.0,
 * }
 */
export interface BreakdownEntry<K extends string> {
  key: K
  total: number
  /** Number of records summed into `total` */
  count: number
  /** Share of the breakdown's grand total, one decimal */
  percentOfTotal: number
}

/**
 * Parameters for the pure aggregator.
 */
export interface AggregatorInput {
  /** Target month in YYYY-MM format */
  month: string
  expenses: Expense[]
  investments: Investment[]
  /** Owner's monthly salary; absent is treated as 0 */
  monthlySalary?: number | null
}

/**
 * Totals and breakdowns for one owner and month.
 *
 * @example
 * const march: MonthlySummary = {
 *   month: '2024-03',
 *   totalIncome: 500000,
 *   totalExpenses: 120000,
 *   totalInvestments: 80000,
 *   totalSavings: 300000,
 *   ...
 * }
 */
export interface MonthlySummary {
  month: string
  /** Monthly salary */
  totalIncome: number
  totalExpenses: number
  totalInvestments: number
  /** income − expenses − investments, negative when overspent */
  totalSavings: number
  expenseCount: number
  investmentCount: number
  /** Sorted by total, highest first */
  expensesByCategory: BreakdownEntry<ExpenseCategory>[]
  /** Sorted by total, highest first */
  investmentsByType: BreakdownEntry<InvestmentType>[]
}

export interface SeriesPoint {
  month: string
  income: number
  expenses: number
  investments: number
  savings: number
}

export interface SeriesTotals {
  income: number
  expenses: number
  investments: number
  savings: number
}

/**
 * Rolling 12-month analytics window ending at `referenceMonth`.
 */
export interface AnalyticsSeries {
  referenceMonth: string
  /** Month keys of the window, oldest first */
  months: string[]
  /** Always one point per month of the window, oldest first */
  points: SeriesPoint[]
  totals: SeriesTotals
  /** Accumulated across every month of the window */
  expensesByCategory: BreakdownEntry<ExpenseCategory>[]
  investmentsByType: BreakdownEntry<InvestmentType>[]
  /** totals.savings / totals.income as a percentage (one decimal), 0 without income */
  savingsRate: number
}

export interface TrendPoint {
  month: string
  expenses: number
}

export interface DashboardOptions {
  month: string
  /** How many of the newest expenses/investments to include */
  recentLimit: number
  /** Months in the spending trend, ending at `month` */
  trendMonths: number
}

export interface DashboardSummary {
  owner: string
  displayName: string
  month: string
  summary: MonthlySummary
  /** Month the budget usage belongs to; falls back to the latest budgeted month */
  budgetMonth: string | null
  budgets: BudgetUsage[]
  spendingTrend: TrendPoint[]
  recentExpenses: Expense[]
  recentInvestments: Investment[]
}

/**
 * Artifact format for generated reports.
 *
 * @example
 * // Human readable
 * spendly report --artifact text
 *
 * // Machine readable
 * spendly report --artifact json
 */
export type ArtifactFormat = 'text' | 'json'

export interface ReportGenerationOptions {
  /** Month to close out, YYYY-MM */
  month: string
  /** Directory the artifact is written into */
  reportsDir: string
  format: ArtifactFormat
  currencySymbol: string
  /** Generation timestamp (defaults to the current time) */
  now?: Date
}

export interface GeneratedReport {
  report: MonthlyReport
  artifactPath: string
  /** Whether an earlier report for the month was replaced */
  replaced: boolean
  summary: MonthlySummary
}

/**
 * Confirmation returned by the month reset action.
 * Records are kept; the reset only snapshots the month.
 */
export interface MonthResetResult {
  month: string
  report: MonthlyReport
  artifactPath: string
  replaced: boolean
  expensesKept: number
  investmentsKept: number
}
