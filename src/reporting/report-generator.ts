/**
 * Month-end reports.
 *
 * The artifact is written to a temporary file first. The snapshot row is
 * saved and the file moved onto its final path inside one store
 * transaction. If anything fails, including the commit, the row is rolled
 * back and the previous artifact (if any) is put back.
 */

import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { ReportGenerationError } from '../shared/errors.js'
import { assertMonthKey } from '../records/record-validation.js'
import { displayName } from '../profile/profile-service.js'
import { budgetUsageForMonth } from '../budgets/budget-service.js'
import { spendingTrend, summarizeMonth } from './monthly-aggregator.js'
import { artifactFileName, renderArtifact } from './report-artifact.js'
import type { GeneratedReport, MonthResetResult, ReportGenerationOptions } from './types.js'

/** Months in the report's spending trend, ending at the report month */
export const REPORT_TREND_MONTHS = 6

export const generateMonthlyReport = (
  store: RecordStore,
  ctx: RequestContext,
  options: ReportGenerationOptions
): GeneratedReport => {
  const month = assertMonthKey(options.month)
  const now = options.now ?? new Date()
  const owner = ctx.ownerId
  const summary = summarizeMonth(store, ctx, month)

  const content = renderArtifact(options.format, {
    owner,
    displayName: displayName(store.getProfile(owner), owner),
    summary,
    budgets: budgetUsageForMonth(store, ctx, month),
    expenses: store.listExpensesForMonth(owner, month),
    investments: store.listInvestmentsForMonth(owner, month),
    spendingTrend: spendingTrend(store, ctx, month, REPORT_TREND_MONTHS),
    currencySymbol: options.currencySymbol,
    generatedAt: now,
  })

  const artifactPath = resolve(options.reportsDir, artifactFileName(owner, month, options.format))
  const tempPath = `${artifactPath}.${process.pid}.tmp`
  const backupPath = `${artifactPath}.${process.pid}.bak`
  const hadPrevious = existsSync(artifactPath)

  let generated: GeneratedReport
  try {
    mkdirSync(options.reportsDir, { recursive: true })
    writeFileSync(tempPath, content, 'utf-8')

    generated = store.transaction(() => {
      const replaced = store.getReport(owner, month) !== null
      const report = store.saveReport({
        owner,
        monthKey: month,
        totalIncome: summary.totalIncome,
        totalExpenses: summary.totalExpenses,
        totalInvestments: summary.totalInvestments,
        totalSavings: summary.totalSavings,
        artifactPath,
        generatedAt: now.toISOString(),
      })
      if (hadPrevious) renameSync(artifactPath, backupPath)
      renameSync(tempPath, artifactPath)
      return { report, artifactPath, replaced, summary }
    })
  } catch (error) {
    if (existsSync(tempPath)) rmSync(tempPath)
    if (existsSync(backupPath)) renameSync(backupPath, artifactPath)
    else if (!hadPrevious && existsSync(artifactPath)) rmSync(artifactPath)
    throw new ReportGenerationError(month, error)
  }

  if (existsSync(backupPath)) rmSync(backupPath)
  return generated
}

/**
 * Closes out a month: generates (or regenerates) its report. Expenses and
 * investments stay untouched.
 */
export const resetMonth = (
  store: RecordStore,
  ctx: RequestContext,
  options: ReportGenerationOptions
): MonthResetResult => {
  const generated = generateMonthlyReport(store, ctx, options)
  return {
    month: generated.summary.month,
    report: generated.report,
    artifactPath: generated.artifactPath,
    replaced: generated.replaced,
    expensesKept: generated.summary.expenseCount,
    investmentsKept: generated.summary.investmentCount,
  }
}
