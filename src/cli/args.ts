import { Command, InvalidArgumentError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { artifactFormatSchema } from '../config/config-types.js'
import type { RecordKind } from '../records/record-types.js'

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(pkgPath, 'utf-8')))
    return pkg.version
  } catch {
    return '0.0.0'
  }
}

const globalOptionsSchema = z.object({
  format: z.enum(['json', 'text']),
  quiet: z.boolean(),
  config: z.string().optional(),
  user: z.string().optional(),
})

const monthOptionsSchema = globalOptionsSchema.extend({
  month: z.string().optional(),
})

const budgetOptionsSchema = monthOptionsSchema.extend({
  set: z.array(z.string()).default([]),
})

const recordFieldsSchema = globalOptionsSchema.extend({
  category: z.string().optional(),
  type: z.string().optional(),
  amount: z.string().optional(),
  description: z.string().optional(),
  date: z.string().optional(),
})

const recordListSchema = globalOptionsSchema.extend({
  category: z.string().optional(),
  type: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  search: z.string().optional(),
})

const profileOptionsSchema = globalOptionsSchema.extend({
  salary: z.string().optional(),
  name: z.string().optional(),
  phone: z.string().optional(),
  dob: z.string().optional(),
  address: z.string().optional(),
})

const reportOptionsSchema = monthOptionsSchema.extend({
  artifact: artifactFormatSchema.optional(),
})

const tuiOptionsSchema = z.object({
  setup: z.boolean().default(false),
  config: z.string().optional(),
  user: z.string().optional(),
})

export type OutputFormat = GlobalOptions['format']
export type GlobalOptions = z.infer<typeof globalOptionsSchema>
export type MonthOptions = z.infer<typeof monthOptionsSchema>
export type BudgetOptions = z.infer<typeof budgetOptionsSchema>
export type ProfileOptions = z.infer<typeof profileOptionsSchema>
export type ReportOptions = z.infer<typeof reportOptionsSchema>

/**
 * Fields of `expense add|edit` and `investment add|edit`. `label` is the
 * category (expenses) or the investment type.
 */
export interface RecordFieldOptions extends GlobalOptions {
  label?: string
  amount?: string
  description?: string
  date?: string
}

export interface RecordListOptions extends GlobalOptions {
  label?: string
  from?: string
  to?: string
  search?: string
}

export type CommandAction =
  | { command: 'dashboard'; options: MonthOptions }
  | { command: 'analytics'; options: MonthOptions }
  | { command: 'budget'; options: BudgetOptions }
  | { command: 'record-add'; kind: RecordKind; options: RecordFieldOptions }
  | { command: 'record-list'; kind: RecordKind; options: RecordListOptions }
  | { command: 'record-edit'; kind: RecordKind; id: number; options: RecordFieldOptions }
  | { command: 'record-delete'; kind: RecordKind; id: number; options: GlobalOptions }
  | { command: 'profile'; options: ProfileOptions }
  | { command: 'report'; options: ReportOptions }
  | { command: 'reset'; options: ReportOptions }
  | { command: 'reports'; options: GlobalOptions }
  | { command: 'seed'; options: GlobalOptions }
  | { command: 'tui'; forceSetup: boolean; config?: string; user?: string }

const parseId = (value: string): number => {
  const id = Number(value)
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError('Expected a positive integer id.')
  }
  return id
}

const collect = (value: string, previous: string[] = []): string[] => [...previous, value]

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('spendly')
    .description('Personal finance tracker: expenses, investments, budgets and monthly reports')
    .version(getVersion())
    .enablePositionalOptions()
    // Before any subcommand is added, so they inherit it
    .exitOverride()
    .option('--setup', 'Run the setup wizard before starting', false)
    .option('--config <path>', 'Path to config file')
    .option('-u, --user <username>', 'Act as this user')
    .action((options: unknown) => {
      // Default action when no subcommand is provided - run TUI
      const parsed = tuiOptionsSchema.parse(options)
      result = { command: 'tui', forceSetup: parsed.setup, config: parsed.config, user: parsed.user }
    })

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .addOption(
        new Option('-f, --format <format>', 'Output format').choices(['json', 'text']).default('json')
      )
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--config <path>', 'Path to config file')
      .option('-u, --user <username>', 'Act as this user')
  }

  const addMonthOption = (cmd: Command) =>
    cmd.option('-m, --month <month>', 'Target month in YYYY-MM format (default: current month)')

  addGlobalOptions(
    addMonthOption(program.command('dashboard').description('Show the monthly dashboard'))
  ).action((options: unknown) => {
    result = { command: 'dashboard', options: monthOptionsSchema.parse(options) }
  })

  addGlobalOptions(
    addMonthOption(
      program.command('analytics').description('Show the 12-month series ending at a month')
    )
  ).action((options: unknown) => {
    result = { command: 'analytics', options: monthOptionsSchema.parse(options) }
  })

  addGlobalOptions(
    addMonthOption(
      program
        .command('budget')
        .description('Show budget usage per category, or set allocations')
        .option('-s, --set <allocation>', 'Set an allocation, e.g. Food=1000 (repeatable)', collect)
    )
  ).action((options: unknown) => {
    result = { command: 'budget', options: budgetOptionsSchema.parse(options) }
  })

  // expense / investment share one layout; only the label flag differs
  const addRecordCommands = (kind: RecordKind) => {
    const labelFlag = kind === 'expense' ? '-c, --category <category>' : '-t, --type <type>'
    const labelHelp = kind === 'expense' ? 'Expense category' : 'Investment type'
    const group = program.command(kind).description(`Manage ${kind}s`)

    const fieldsOf = (options: unknown): RecordFieldOptions => {
      const { category, type, ...rest } = recordFieldsSchema.parse(options)
      return { ...rest, label: kind === 'expense' ? category : type }
    }

    addGlobalOptions(
      group
        .command('add')
        .description(`Record a new ${kind}`)
        .option(labelFlag, labelHelp)
        .option('-a, --amount <amount>', 'Amount, e.g. 12.50')
        .option('-d, --description <text>', 'Description')
        .option('--date <date>', 'Date (YYYY-MM-DD or ISO timestamp, default: now)')
    ).action((options: unknown) => {
      result = { command: 'record-add', kind, options: fieldsOf(options) }
    })

    addGlobalOptions(
      group
        .command('list')
        .description(`List ${kind}s`)
        .option(labelFlag, `Filter by ${labelHelp.toLowerCase()}`)
        .option('--from <date>', 'Only on or after this day (YYYY-MM-DD)')
        .option('--to <date>', 'Only on or before this day (YYYY-MM-DD)')
        .option('-s, --search <text>', 'Search descriptions')
    ).action((options: unknown) => {
      const { category, type, ...rest } = recordListSchema.parse(options)
      result = {
        command: 'record-list',
        kind,
        options: { ...rest, label: kind === 'expense' ? category : type },
      }
    })

    addGlobalOptions(
      group
        .command('edit')
        .description(`Change fields of an ${kind}`)
        .argument('<id>', 'Record id', parseId)
        .option(labelFlag, labelHelp)
        .option('-a, --amount <amount>', 'Amount')
        .option('-d, --description <text>', 'Description')
        .option('--date <date>', 'Date')
    ).action((id: number, options: unknown) => {
      result = { command: 'record-edit', kind, id, options: fieldsOf(options) }
    })

    addGlobalOptions(
      group.command('delete').description(`Delete an ${kind}`).argument('<id>', 'Record id', parseId)
    ).action((id: number, options: unknown) => {
      result = { command: 'record-delete', kind, id, options: globalOptionsSchema.parse(options) }
    })
  }

  addRecordCommands('expense')
  addRecordCommands('investment')

  addGlobalOptions(
    program
      .command('profile')
      .description('Show or update your profile')
      .option('--salary <amount>', 'Monthly salary')
      .option('--name <name>', 'Full name')
      .option('--phone <number>', 'Phone number')
      .option('--dob <date>', 'Date of birth (YYYY-MM-DD)')
      .option('--address <text>', 'Address')
  ).action((options: unknown) => {
    result = { command: 'profile', options: profileOptionsSchema.parse(options) }
  })

  const addArtifactOption = (cmd: Command) =>
    cmd.addOption(
      new Option('--artifact <format>', 'Report file format (default: from config)').choices([
        'text',
        'json',
      ])
    )

  addGlobalOptions(
    addArtifactOption(
      addMonthOption(program.command('report').description('Generate the monthly report'))
    )
  ).action((options: unknown) => {
    result = { command: 'report', options: reportOptionsSchema.parse(options) }
  })

  addGlobalOptions(
    addArtifactOption(
      addMonthOption(
        program
          .command('reset')
          .description('Close out a month: snapshot it into a report (records are kept)')
      )
    )
  ).action((options: unknown) => {
    result = { command: 'reset', options: reportOptionsSchema.parse(options) }
  })

  addGlobalOptions(
    program.command('reports').description('List the monthly reports generated so far')
  ).action((options: unknown) => {
    result = { command: 'reports', options: globalOptionsSchema.parse(options) }
  })

  addGlobalOptions(
    program.command('seed').description('Fill your account with a year of demo data')
  ).action((options: unknown) => {
    result = { command: 'seed', options: globalOptionsSchema.parse(options) }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return null
      }
    }
    throw err
  }

  return result
}
