import type { GlobalOptions } from '../args.js'
import { createFormatter } from '../output.js'
import type { CommandContext } from './command-context.js'
import { seedDemoData, type SeedResult } from '../../seed/demo-data.js'

export const formatTextSeed = (result: SeedResult): string =>
  [
    `  Seeded demo data for ${result.owner} (${result.months[result.months.length - 1]} to ${result.months[0]})`,
    `  Expenses:       ${result.expensesCreated}`,
    `  Investments:    ${result.investmentsCreated}`,
    `  Budgets:        ${result.budgetsSet}`,
    `  Reports:        ${result.reportsGenerated}`,
  ].join('\n')

/**
 * @example
 * spendly seed --user demo
 */
export const seedCommand = (options: GlobalOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, now, config } = context

  formatter.progress(`Seeding a year of demo data for ${ctx.ownerId}...`)

  const result = seedDemoData(store, ctx, {
    now,
    reportsDir: config.storage.reportsDir,
    format: config.report.artifactFormat,
    currencySymbol: config.currency.symbol,
  })

  formatter.success({
    success: true,
    ...result,
    ...(options.format === 'text' ? { formatted: formatTextSeed(result) } : {}),
  })
}
