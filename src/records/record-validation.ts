import { z } from 'zod'
import { parseAmount } from '../shared/money.js'
import { isMonthKey, parseTimestamp } from '../shared/dates.js'
import { ValidationError, type FieldErrors } from '../shared/errors.js'
import {
  EXPENSE_CATEGORIES,
  INVESTMENT_TYPES,
  type BudgetInput,
  type ExpenseInput,
  type InvestmentInput,
  type ProfileFields,
} from './record-types.js'

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; fieldErrors: FieldErrors }

/**
 * Accepts a decimal string or number and yields integer minor units.
 */
const amountField = (label: string) =>
  z.preprocess(
    (value) => (typeof value === 'number' ? String(value) : value),
    z
      .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
      .transform((value, ctx) => {
        const minorUnits = parseAmount(value)
        if (minorUnits === null) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${label} must be a non-negative number with at most two decimals`,
          })
          return z.NEVER
        }
        return minorUnits
      })
  )

const timestampField = z
  .string({ required_error: 'Date is required' })
  .transform((value, ctx) => {
    const date = parseTimestamp(value)
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date` })
      return z.NEVER
    }
    return date.toISOString()
  })

const descriptionField = z
  .string({ required_error: 'Description is required' })
  .trim()
  .min(1, 'Description is required')

const categoryField = z.enum(EXPENSE_CATEGORIES, {
  errorMap: () => ({ message: `Category must be one of: ${EXPENSE_CATEGORIES.join(', ')}` }),
})

const investmentTypeField = z.enum(INVESTMENT_TYPES, {
  errorMap: () => ({ message: `Investment type must be one of: ${INVESTMENT_TYPES.join(', ')}` }),
})

const monthField = z
  .string({ required_error: 'Month is required' })
  .refine(isMonthKey, 'Month must use the YYYY-MM format')

const expenseFields = {
  category: categoryField,
  amount: amountField('Amount'),
  description: descriptionField,
  occurredAt: timestampField,
}

const investmentFields = {
  investmentType: investmentTypeField,
  amount: amountField('Amount'),
  description: descriptionField,
  occurredAt: timestampField,
}

export const budgetInputSchema = z.object({
  category: categoryField,
  monthKey: monthField,
  allocatedAmount: amountField('Allocated amount'),
})

export const profileInputSchema = z
  .object({
    fullName: z.string().trim().max(100, 'Full name must be at most 100 characters'),
    monthlySalary: amountField('Monthly salary'),
    phoneNumber: z.string().trim().max(15, 'Phone number must be at most 15 characters'),
    dateOfBirth: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date of birth must use the YYYY-MM-DD format')
      .refine((value) => parseTimestamp(value) !== null, 'Date of birth is not a real date')
      .nullable(),
    address: z.string().trim(),
  })
  .partial()

/**
 * Groups zod issues by field path. Issues without a path land under `_form`.
 */
export const collectFieldErrors = (error: z.ZodError): FieldErrors => {
  const fieldErrors: FieldErrors = {}
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_form'
    fieldErrors[field] = [...(fieldErrors[field] ?? []), issue.message]
  }
  return fieldErrors
}

const toResult = <I, T>(parsed: z.SafeParseReturnType<I, T>): ValidationResult<T> =>
  parsed.success
    ? { success: true, data: parsed.data }
    : { success: false, fieldErrors: collectFieldErrors(parsed.error) }

/**
 * Validates a new expense. A missing date defaults to `now`.
 *
 * @example
 * validateExpenseInput({ category: 'Food', amount: '12.50', description: 'Lunch' })
 * // => { success: true, data: { category: 'Food', amount: 1250, ... } }
 */
export const validateExpenseInput = (
  raw: unknown,
  now: Date = new Date()
): ValidationResult<ExpenseInput> =>
  toResult(
    z
      .object({ ...expenseFields, occurredAt: timestampField.default(now.toISOString()) })
      .safeParse(raw)
  )

/**
 * Validates the changed fields of an expense edit. Absent fields are left out.
 */
export const validateExpensePatch = (raw: unknown): ValidationResult<Partial<ExpenseInput>> =>
  toResult(z.object(expenseFields).partial().safeParse(raw))

export const validateInvestmentInput = (
  raw: unknown,
  now: Date = new Date()
): ValidationResult<InvestmentInput> =>
  toResult(
    z
      .object({ ...investmentFields, occurredAt: timestampField.default(now.toISOString()) })
      .safeParse(raw)
  )

export const validateInvestmentPatch = (raw: unknown): ValidationResult<Partial<InvestmentInput>> =>
  toResult(z.object(investmentFields).partial().safeParse(raw))

export const validateBudgetInput = (raw: unknown): ValidationResult<BudgetInput> =>
  toResult(budgetInputSchema.safeParse(raw))

export const validateProfileInput = (raw: unknown): ValidationResult<Partial<ProfileFields>> =>
  toResult(profileInputSchema.safeParse(raw))

/**
 * Throws a ValidationError unless `month` is a `YYYY-MM` key.
 */
export const assertMonthKey = (month: string): string => {
  if (!isMonthKey(month)) {
    throw new ValidationError('Invalid month', { month: [`"${month}" is not a YYYY-MM month`] })
  }
  return month
}
