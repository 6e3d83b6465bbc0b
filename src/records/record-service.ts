import { z } from 'zod'
import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { NotFoundError, ValidationError } from '../shared/errors.js'
import {
  collectFieldErrors,
  validateExpenseInput,
  validateExpensePatch,
  validateInvestmentInput,
  validateInvestmentPatch,
} from './record-validation.js'
import {
  EXPENSE_CATEGORIES,
  INVESTMENT_TYPES,
  type Expense,
  type Investment,
  type RecordFilter,
} from './record-types.js'

export interface RecordListFilter {
  /** Expense category or investment type */
  label?: string
  /** Inclusive start day, YYYY-MM-DD */
  from?: string
  /** Inclusive end day, YYYY-MM-DD */
  to?: string
  /** Case-insensitive match against the description */
  search?: string
}

export interface RecordListResult<T> {
  records: T[]
  count: number
  /** Sum of the listed amounts, minor units */
  total: number
}

const dayField = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must use the YYYY-MM-DD format')

const filterSchema = <L extends string>(labels: readonly [L, ...L[]], labelName: string) =>
  z.object({
    label: z
      .enum(labels, { errorMap: () => ({ message: `${labelName} must be one of: ${labels.join(', ')}` }) })
      .optional(),
    from: dayField.optional(),
    to: dayField.optional(),
    search: z.string().trim().min(1).optional(),
  })

const parseFilter = <L extends string>(
  raw: RecordListFilter,
  labels: readonly [L, ...L[]],
  labelName: string
): RecordFilter<L> => {
  const parsed = filterSchema(labels, labelName).safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError('Invalid list filter', collectFieldErrors(parsed.error))
  }
  return parsed.data
}

const summarize = <T extends { amount: number }>(records: T[]): RecordListResult<T> => ({
  records,
  count: records.length,
  total: records.reduce((sum, record) => sum + record.amount, 0),
})

// ── Expenses ────────────────────────────────────────────────────────────────

export const addExpense = (
  store: RecordStore,
  ctx: RequestContext,
  raw: unknown,
  now: Date = new Date()
): Expense => {
  const result = validateExpenseInput(raw, now)
  if (!result.success) {
    throw new ValidationError('Invalid expense', result.fieldErrors)
  }
  return store.insertExpense(ctx.ownerId, result.data)
}

/**
 * Applies the provided fields to an owned expense. The month key follows
 * the (possibly new) date.
 */
export const editExpense = (
  store: RecordStore,
  ctx: RequestContext,
  id: number,
  raw: unknown
): Expense => {
  const existing = store.getExpense(ctx.ownerId, id)
  if (!existing) throw new NotFoundError('expense', id)

  const result = validateExpensePatch(raw)
  if (!result.success) {
    throw new ValidationError('Invalid expense', result.fieldErrors)
  }

  const patch = result.data
  const updated = store.updateExpense(ctx.ownerId, id, {
    category: patch.category ?? existing.category,
    amount: patch.amount ?? existing.amount,
    description: patch.description ?? existing.description,
    occurredAt: patch.occurredAt ?? existing.occurredAt,
  })
  if (!updated) throw new NotFoundError('expense', id)
  return updated
}

/**
 * Deletes an owned expense and returns what was removed.
 */
export const deleteExpense = (store: RecordStore, ctx: RequestContext, id: number): Expense => {
  const existing = store.getExpense(ctx.ownerId, id)
  if (!existing || !store.deleteExpense(ctx.ownerId, id)) {
    throw new NotFoundError('expense', id)
  }
  return existing
}

export const listExpenses = (
  store: RecordStore,
  ctx: RequestContext,
  filter: RecordListFilter = {}
): RecordListResult<Expense> =>
  summarize(store.listExpenses(ctx.ownerId, parseFilter(filter, EXPENSE_CATEGORIES, 'Category')))

// ── Investments ─────────────────────────────────────────────────────────────

export const addInvestment = (
  store: RecordStore,
  ctx: RequestContext,
  raw: unknown,
  now: Date = new Date()
): Investment => {
  const result = validateInvestmentInput(raw, now)
  if (!result.success) {
    throw new ValidationError('Invalid investment', result.fieldErrors)
  }
  return store.insertInvestment(ctx.ownerId, result.data)
}

export const editInvestment = (
  store: RecordStore,
  ctx: RequestContext,
  id: number,
  raw: unknown
): Investment => {
  const existing = store.getInvestment(ctx.ownerId, id)
  if (!existing) throw new NotFoundError('investment', id)

  const result = validateInvestmentPatch(raw)
  if (!result.success) {
    throw new ValidationError('Invalid investment', result.fieldErrors)
  }

  const patch = result.data
  const updated = store.updateInvestment(ctx.ownerId, id, {
    investmentType: patch.investmentType ?? existing.investmentType,
    amount: patch.amount ?? existing.amount,
    description: patch.description ?? existing.description,
    occurredAt: patch.occurredAt ?? existing.occurredAt,
  })
  if (!updated) throw new NotFoundError('investment', id)
  return updated
}

export const deleteInvestment = (store: RecordStore, ctx: RequestContext, id: number): Investment => {
  const existing = store.getInvestment(ctx.ownerId, id)
  if (!existing || !store.deleteInvestment(ctx.ownerId, id)) {
    throw new NotFoundError('investment', id)
  }
  return existing
}

export const listInvestments = (
  store: RecordStore,
  ctx: RequestContext,
  filter: RecordListFilter = {}
): RecordListResult<Investment> =>
  summarize(
    store.listInvestments(ctx.ownerId, parseFilter(filter, INVESTMENT_TYPES, 'Investment type'))
  )
