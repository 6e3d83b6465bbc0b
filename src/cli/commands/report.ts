import { basename } from 'node:path'
import type { GlobalOptions, ReportOptions } from '../args.js'
import { createFormatter, formatTable } from '../output.js'
import { resolveMonth, type CommandContext } from './command-context.js'
import { formatMoney } from '../../shared/money.js'
import type { MonthlyReport } from '../../records/record-types.js'
import {
  generateMonthlyReport,
  resetMonth,
  type GeneratedReport,
  type MonthResetResult,
  type ReportGenerationOptions,
} from '../../reporting/index.js'

const generationOptions = (
  options: ReportOptions,
  context: CommandContext
): ReportGenerationOptions => ({
  month: resolveMonth(options.month, context.now),
  reportsDir: context.config.storage.reportsDir,
  format: options.artifact ?? context.config.report.artifactFormat,
  currencySymbol: context.config.currency.symbol,
  now: context.now,
})

export const formatTextReport = (generated: GeneratedReport, symbol: string): string => {
  const { report } = generated
  return [
    `  Report for ${report.monthKey} ${generated.replaced ? 'regenerated' : 'generated'}`,
    '',
    `  Income:         ${formatMoney(report.totalIncome, symbol)}`,
    `  Expenses:       ${formatMoney(report.totalExpenses, symbol)}`,
    `  Investments:    ${formatMoney(report.totalInvestments, symbol)}`,
    `  Savings:        ${formatMoney(report.totalSavings, symbol)}`,
    '',
    `  Saved to ${generated.artifactPath}`,
  ].join('\n')
}

export const formatTextReset = (result: MonthResetResult): string =>
  [
    `  Month ${result.month} closed out.`,
    `  Kept ${result.expensesKept} expense(s) and ${result.investmentsKept} investment(s).`,
    `  Report saved to ${result.artifactPath}`,
  ].join('\n')

/**
 * Report CLI command implementation.
 *
 * @example
 * spendly report --month 2024-03 --artifact json
 */
export const reportCommand = (options: ReportOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const genOptions = generationOptions(options, context)

  formatter.progress(`Generating report for ${genOptions.month}...`)

  const generated = generateMonthlyReport(context.store, context.ctx, genOptions)

  formatter.success({
    success: true,
    report: generated.report,
    artifactPath: generated.artifactPath,
    replaced: generated.replaced,
    summary: generated.summary,
    ...(options.format === 'text'
      ? { formatted: formatTextReport(generated, context.config.currency.symbol) }
      : {}),
  })
}

/**
 * Snapshots the month into a report. Records are never deleted.
 *
 * @example
 * spendly reset --month 2024-03
 */
export const resetCommand = (options: ReportOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const genOptions = generationOptions(options, context)

  formatter.progress(`Closing out ${genOptions.month}...`)

  const result = resetMonth(context.store, context.ctx, genOptions)

  formatter.success({
    success: true,
    ...result,
    ...(options.format === 'text' ? { formatted: formatTextReset(result) } : {}),
  })
}

export const formatTextReportList = (reports: MonthlyReport[], symbol: string): string => {
  if (reports.length === 0) {
    return "No reports yet. Run 'spendly report' to generate one."
  }
  return formatTable(
    ['Month', 'Income', 'Expenses', 'Investments', 'Savings', 'File'],
    reports.map((r) => [
      r.monthKey,
      formatMoney(r.totalIncome, symbol),
      formatMoney(r.totalExpenses, symbol),
      formatMoney(r.totalInvestments, symbol),
      formatMoney(r.totalSavings, symbol),
      basename(r.artifactPath),
    ]),
    { alignRight: [1, 2, 3, 4] }
  )
}

/**
 * Saved report snapshots, newest month first.
 *
 * @example
 * spendly reports --format text
 */
export const reportsCommand = (options: GlobalOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const reports = context.store.listReports(context.ctx.ownerId)

  formatter.success({
    success: true,
    reports,
    count: reports.length,
    ...(options.format === 'text'
      ? { formatted: formatTextReportList(reports, context.config.currency.symbol) }
      : {}),
  })
}
