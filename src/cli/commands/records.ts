import type { GlobalOptions, RecordFieldOptions, RecordListOptions } from '../args.js'
import { createFormatter, formatTable } from '../output.js'
import type { CommandContext } from './command-context.js'
import { formatMoney } from '../../shared/money.js'
import { dayKeyOf } from '../../shared/dates.js'
import type { Expense, Investment, RecordKind } from '../../records/record-types.js'
import {
  addExpense,
  addInvestment,
  deleteExpense,
  deleteInvestment,
  editExpense,
  editInvestment,
  listExpenses,
  listInvestments,
  type RecordListResult,
} from '../../records/record-service.js'

type AnyRecord = Expense | Investment

const labelOf = (record: AnyRecord): string =>
  'category' in record ? record.category : record.investmentType

/**
 * Maps CLI flags onto the record input shape of the given kind.
 */
export const toRecordInput = (kind: RecordKind, options: RecordFieldOptions) => ({
  ...(kind === 'expense' ? { category: options.label } : { investmentType: options.label }),
  amount: options.amount,
  description: options.description,
  occurredAt: options.date,
})

export const formatTextRecords = (
  kind: RecordKind,
  result: RecordListResult<AnyRecord>,
  symbol: string
): string => {
  if (result.count === 0) return `No ${kind}s found.`

  const table = formatTable(
    ['ID', 'Date', kind === 'expense' ? 'Category' : 'Type', 'Amount', 'Description'],
    result.records.map((r) => [
      String(r.id),
      dayKeyOf(r.occurredAt),
      labelOf(r),
      formatMoney(r.amount, symbol),
      r.description.slice(0, 40),
    ]),
    { alignRight: [3] }
  )
  return `${table}\n\n${result.count} ${kind}(s), total ${formatMoney(result.total, symbol)}`
}

const formatTextRecord = (verb: string, kind: RecordKind, record: AnyRecord, symbol: string) =>
  `${verb} ${kind} #${record.id}: ${labelOf(record)} ${formatMoney(record.amount, symbol)} on ${dayKeyOf(record.occurredAt)} (${record.description})`

/**
 * @example
 * spendly expense add --category Food --amount 12.50 --description Lunch
 */
export const recordAddCommand = (
  kind: RecordKind,
  options: RecordFieldOptions,
  context: CommandContext
): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, now, config } = context
  const input = toRecordInput(kind, options)
  const record =
    kind === 'expense' ? addExpense(store, ctx, input, now) : addInvestment(store, ctx, input, now)

  formatter.success({
    success: true,
    [kind]: record,
    ...(options.format === 'text'
      ? { formatted: formatTextRecord('Added', kind, record, config.currency.symbol) }
      : {}),
  })
}

/**
 * @example
 * spendly expense list --category Food --from 2024-03-01 --search lunch
 */
export const recordListCommand = (
  kind: RecordKind,
  options: RecordListOptions,
  context: CommandContext
): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, config } = context
  const filter = { label: options.label, from: options.from, to: options.to, search: options.search }
  const result: RecordListResult<AnyRecord> =
    kind === 'expense' ? listExpenses(store, ctx, filter) : listInvestments(store, ctx, filter)

  formatter.success({
    success: true,
    count: result.count,
    total: result.total,
    [`${kind}s`]: result.records,
    ...(options.format === 'text'
      ? { formatted: formatTextRecords(kind, result, config.currency.symbol) }
      : {}),
  })
}

export const recordEditCommand = (
  kind: RecordKind,
  id: number,
  options: RecordFieldOptions,
  context: CommandContext
): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, config } = context
  const input = toRecordInput(kind, options)
  const record =
    kind === 'expense' ? editExpense(store, ctx, id, input) : editInvestment(store, ctx, id, input)

  formatter.success({
    success: true,
    [kind]: record,
    ...(options.format === 'text'
      ? { formatted: formatTextRecord('Updated', kind, record, config.currency.symbol) }
      : {}),
  })
}

export const recordDeleteCommand = (
  kind: RecordKind,
  id: number,
  options: GlobalOptions,
  context: CommandContext
): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, config } = context
  const record = kind === 'expense' ? deleteExpense(store, ctx, id) : deleteInvestment(store, ctx, id)

  formatter.success({
    success: true,
    deleted: record,
    ...(options.format === 'text'
      ? { formatted: formatTextRecord('Deleted', kind, record, config.currency.symbol) }
      : {}),
  })
}
