/**
 * Persisted record shapes. All amounts are integer minor units
 * (see shared/money.ts) and every month key is `YYYY-MM`.
 */

export const EXPENSE_CATEGORIES = [
  'Food',
  'Transport',
  'Shopping',
  'Bills',
  'Entertainment',
  'Healthcare',
  'Education',
  'Other',
] as const

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number]

export const INVESTMENT_TYPES = [
  'Stocks',
  'Mutual Funds',
  'Real Estate',
  'Savings',
  'Crypto',
  'Other',
] as const

export type InvestmentType = (typeof INVESTMENT_TYPES)[number]

export type RecordKind = 'expense' | 'investment'

export const isExpenseCategory = (value: string): value is ExpenseCategory =>
  EXPENSE_CATEGORIES.some((category) => category === value)

export const isInvestmentType = (value: string): value is InvestmentType =>
  INVESTMENT_TYPES.some((type) => type === value)

export interface Expense {
  id: number
  owner: string
  category: ExpenseCategory
  amount: number
  description: string
  /** ISO-8601 UTC timestamp */
  occurredAt: string
  /** Always the UTC year-month of occurredAt */
  monthKey: string
  createdAt: string
}

export interface Investment {
  id: number
  owner: string
  investmentType: InvestmentType
  amount: number
  description: string
  occurredAt: string
  monthKey: string
  createdAt: string
}

export interface ExpenseInput {
  category: ExpenseCategory
  amount: number
  description: string
  occurredAt: string
}

export interface InvestmentInput {
  investmentType: InvestmentType
  amount: number
  description: string
  occurredAt: string
}

/**
 * Filters for record listings. Dates are inclusive calendar days (`YYYY-MM-DD`).
 */
export interface RecordFilter<L extends string> {
  label?: L
  from?: string
  to?: string
  search?: string
}

export interface Budget {
  id: number
  owner: string
  category: ExpenseCategory
  monthKey: string
  allocatedAmount: number
  createdAt: string
  updatedAt: string
}

export interface BudgetInput {
  category: ExpenseCategory
  monthKey: string
  allocatedAmount: number
}

export interface MonthlyReport {
  id: number
  owner: string
  monthKey: string
  totalIncome: number
  totalExpenses: number
  totalInvestments: number
  totalSavings: number
  artifactPath: string
  generatedAt: string
}

export type ReportSnapshot = Omit<MonthlyReport, 'id'>

export interface Profile {
  owner: string
  fullName: string
  monthlySalary: number
  phoneNumber: string
  /** `YYYY-MM-DD` */
  dateOfBirth: string | null
  address: string
  createdAt: string
  updatedAt: string
}

export type ProfileFields = Pick<
  Profile,
  'fullName' | 'monthlySalary' | 'phoneNumber' | 'dateOfBirth' | 'address'
>
