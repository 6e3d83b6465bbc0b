import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { budgetCommand, parseAllocations } from '../budget.js'
import { budgetStatus } from '../dashboard.js'
import type { CommandContext } from '../command-context.js'
import { ValidationError } from '../../../shared/errors.js'
import {
  createMockConfig,
  createTestContext,
  createTestStore,
  TEST_NOW,
} from '../../../test-utils/fixtures.js'

describe('parseAllocations', () => {
  it('splits on the first equals sign', () => {
    expect(parseAllocations(['Food=1000', ' Bills = 450.50 '])).toEqual({
      Food: '1000',
      Bills: '450.50',
    })
  })

  it('rejects entries without a category', () => {
    try {
      parseAllocations(['Food', '=5'])
      expect.unreachable('parseAllocations should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      expect(error instanceof ValidationError && error.fieldErrors).toEqual({
        set: ['"Food" must look like Category=amount', '"=5" must look like Category=amount'],
      })
    }
  })
})

describe('budgetStatus', () => {
  it('flags over and nearly spent budgets', () => {
    expect(budgetStatus({ isOverBudget: true, percentUsed: 120 })).toBe('OVER')
    expect(budgetStatus({ isOverBudget: false, percentUsed: 80.1 })).toBe('WARN')
    expect(budgetStatus({ isOverBudget: false, percentUsed: 80 })).toBe('OK')
  })
})

describe('budgetCommand', () => {
  let context: CommandContext

  beforeEach(() => {
    context = {
      config: createMockConfig(),
      store: createTestStore(),
      ctx: createTestContext(),
      now: TEST_NOW,
    }
  })

  afterEach(() => {
    context.store.close()
    vi.restoreAllMocks()
  })

  it('saves allocations before showing the overview', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    budgetCommand({ format: 'json', quiet: true, set: ['Food=1000'] }, context)

    const output: unknown = JSON.parse(String(log.mock.calls[0][0]))
    expect(output).toMatchObject({ success: true, month: '2024-03' })
    expect(context.store.getBudget('alice', 'Food', '2024-03')?.allocatedAmount).toBe(100000)
  })

  it('writes nothing when an allocation is invalid', () => {
    expect(() =>
      budgetCommand({ format: 'json', quiet: true, set: ['Food=1000', 'Rent=5'] }, context)
    ).toThrow(ValidationError)
    expect(context.store.listBudgetsForMonth('alice', '2024-03')).toEqual([])
  })
})
