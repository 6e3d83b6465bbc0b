import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { formatTextRecords, recordAddCommand, recordEditCommand, toRecordInput } from '../records.js'
import type { CommandContext } from '../command-context.js'
import {
  createMockConfig,
  createMockExpense,
  createTestContext,
  createTestStore,
  TEST_NOW,
} from '../../../test-utils/fixtures.js'

const base = { format: 'json' as const, quiet: true }

describe('toRecordInput', () => {
  it('maps the label to the category for expenses', () => {
    expect(toRecordInput('expense', { ...base, label: 'Food', amount: '5', date: '2024-03-01' })).toEqual({
      category: 'Food',
      amount: '5',
      occurredAt: '2024-03-01',
    })
  })

  it('maps the label to the investment type for investments', () => {
    expect(toRecordInput('investment', { ...base, label: 'Crypto' })).toEqual({
      investmentType: 'Crypto',
    })
  })
})

describe('formatTextRecords', () => {
  it('says when nothing matched', () => {
    expect(formatTextRecords('investment', { records: [], count: 0, total: 0 }, '$')).toBe(
      'No investments found.'
    )
  })

  it('renders a table and the total', () => {
    const text = formatTextRecords(
      'expense',
      { records: [createMockExpense()], count: 1, total: 1000 },
      '$'
    )

    expect(text).toBe(
      [
        'ID  Date        Category  Amount  Description',
        '--  ----------  --------  ------  ------------',
        '1   2024-03-10  Food      $10.00  Test expense',
        '',
        '1 expense(s), total $10.00',
      ].join('\n')
    )
  })
})

describe('record commands', () => {
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

  it('adds an expense dated now when no date is given', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    recordAddCommand('expense', { ...base, label: 'Food', amount: '12.50', description: 'Lunch' }, context)

    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      success: true,
      expense: { category: 'Food', amount: 1250, occurredAt: '2024-03-31T12:00:00.000Z' },
    })
  })

  it('edits only the flags that were passed', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    recordAddCommand(
      'investment',
      { ...base, label: 'Stocks', amount: '100', description: 'ETF', date: '2024-03-02' },
      context
    )

    recordEditCommand('investment', 1, { ...base, amount: '150' }, context)

    expect(context.store.getInvestment('alice', 1)).toMatchObject({
      investmentType: 'Stocks',
      amount: 15000,
      description: 'ETF',
      monthKey: '2024-03',
    })
  })
})
