import { describe, it, expect } from 'vitest'
import {
  assertMonthKey,
  validateBudgetInput,
  validateExpenseInput,
  validateExpensePatch,
  validateInvestmentInput,
  validateProfileInput,
} from '../record-validation.js'
import { ValidationError } from '../../shared/errors.js'
import { TEST_NOW } from '../../test-utils/fixtures.js'

describe('validateExpenseInput', () => {
  it('converts amounts and dates', () => {
    const result = validateExpenseInput({
      category: 'Food',
      amount: '12.50',
      description: ' Lunch ',
      occurredAt: '2024-03-05',
    })

    expect(result).toEqual({
      success: true,
      data: {
        category: 'Food',
        amount: 1250,
        description: 'Lunch',
        occurredAt: '2024-03-05T00:00:00.000Z',
      },
    })
  })

  it('accepts numeric amounts', () => {
    const result = validateExpenseInput(
      { category: 'Bills', amount: 12.5, description: 'Power', occurredAt: '2024-03-05' },
      TEST_NOW
    )
    expect(result.success && result.data.amount).toBe(1250)
  })

  it('defaults a missing date to now', () => {
    const result = validateExpenseInput({ category: 'Food', amount: '1', description: 'Tea' }, TEST_NOW)
    expect(result.success && result.data.occurredAt).toBe('2024-03-31T12:00:00.000Z')
  })

  it('reports each invalid field', () => {
    const result = validateExpenseInput({
      category: 'Rent',
      amount: '-5',
      description: '   ',
      occurredAt: 'someday',
    })

    expect(result).toEqual({
      success: false,
      fieldErrors: {
        category: [
          'Category must be one of: Food, Transport, Shopping, Bills, Entertainment, Healthcare, Education, Other',
        ],
        amount: ['Amount must be a non-negative number with at most two decimals'],
        description: ['Description is required'],
        occurredAt: ['"someday" is not a valid date'],
      },
    })
  })

  it('rejects an impossible day instead of moving it into the next month', () => {
    const result = validateExpenseInput({
      category: 'Food',
      amount: '5',
      description: 'Lunch',
      occurredAt: '2024-02-30',
    })

    expect(result).toEqual({
      success: false,
      fieldErrors: { occurredAt: ['"2024-02-30" is not a valid date'] },
    })
  })

  it('rejects more than two decimals', () => {
    const result = validateExpenseInput({ category: 'Food', amount: '1.005', description: 'x' })
    expect(result.success).toBe(false)
  })
})

describe('validateExpensePatch', () => {
  it('keeps only the provided fields', () => {
    expect(validateExpensePatch({ amount: '20' })).toEqual({ success: true, data: { amount: 2000 } })
  })

  it('still validates what is provided', () => {
    const result = validateExpensePatch({ category: 'Rent' })
    expect(result.success).toBe(false)
  })
})

describe('validateInvestmentInput', () => {
  it('checks the investment type', () => {
    const result = validateInvestmentInput({
      investmentType: 'Gold',
      amount: '10',
      description: 'Bar',
      occurredAt: '2024-03-01',
    })

    expect(result).toEqual({
      success: false,
      fieldErrors: {
        investmentType: [
          'Investment type must be one of: Stocks, Mutual Funds, Real Estate, Savings, Crypto, Other',
        ],
      },
    })
  })
})

describe('validateBudgetInput', () => {
  it('accepts a zero allocation', () => {
    expect(validateBudgetInput({ category: 'Food', monthKey: '2024-03', allocatedAmount: '0' })).toEqual({
      success: true,
      data: { category: 'Food', monthKey: '2024-03', allocatedAmount: 0 },
    })
  })

  it('rejects malformed months', () => {
    const result = validateBudgetInput({ category: 'Food', monthKey: '2024-3', allocatedAmount: '10' })
    expect(result).toEqual({
      success: false,
      fieldErrors: { monthKey: ['Month must use the YYYY-MM format'] },
    })
  })
})

describe('validateProfileInput', () => {
  it('accepts a partial update', () => {
    expect(validateProfileInput({ monthlySalary: '5200' })).toEqual({
      success: true,
      data: { monthlySalary: 520000 },
    })
  })

  it('limits the phone number length', () => {
    const result = validateProfileInput({ phoneNumber: '0123456789012345' })
    expect(result).toEqual({
      success: false,
      fieldErrors: { phoneNumber: ['Phone number must be at most 15 characters'] },
    })
  })

  it('requires ISO dates of birth', () => {
    const result = validateProfileInput({ dateOfBirth: '01/02/1990' })
    expect(result.success).toBe(false)
    expect(!result.success && result.fieldErrors.dateOfBirth).toContain(
      'Date of birth must use the YYYY-MM-DD format'
    )
  })

  it('rejects a date of birth the calendar does not have', () => {
    expect(validateProfileInput({ dateOfBirth: '2023-02-29' })).toEqual({
      success: false,
      fieldErrors: { dateOfBirth: ['Date of birth is not a real date'] },
    })
  })

  it('allows clearing the date of birth', () => {
    expect(validateProfileInput({ dateOfBirth: null })).toEqual({
      success: true,
      data: { dateOfBirth: null },
    })
  })
})

describe('assertMonthKey', () => {
  it('returns valid months', () => {
    expect(assertMonthKey('2024-03')).toBe('2024-03')
  })

  it('throws a ValidationError otherwise', () => {
    expect(() => assertMonthKey('March')).toThrow(ValidationError)
  })
})
