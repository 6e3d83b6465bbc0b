#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { App } from './app.js'
import { runSetupWizard, type SetupResult } from './config/setup-wizard.js'
import type { AppConfig } from './config/config-types.js'
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv, ENV_VARS } from './config/config-loader.js'
import {
  analyticsCommand,
  budgetCommand,
  dashboardCommand,
  profileCommand,
  recordAddCommand,
  recordDeleteCommand,
  recordEditCommand,
  recordListCommand,
  reportCommand,
  reportsCommand,
  resetCommand,
  seedCommand,
  type CommandContext,
} from './cli/commands/index.js'
import { createFormatter, type OutputFormatter } from './cli/output.js'
import { createRecordStore } from './shared/record-store.js'
import { createRequestContext } from './shared/context.js'
import { currentMonth } from './shared/dates.js'
import { isSpendlyError } from './shared/errors.js'
import { updateProfile } from './profile/profile-service.js'

type TuiAction = Extract<CommandAction, { command: 'tui' }>
type CliAction = Exclude<CommandAction, { command: 'tui' }>

/**
 * Renders the TUI until the user quits. Re-running setup from inside the
 * app unmounts it, runs the wizard and starts over with the new config.
 */
const runTuiMode = async (action: TuiAction) => {
  const overrides = { user: action.user, configPath: action.config }
  const loaded = await loadConfigWithEnv(overrides)

  let config: AppConfig | null = loaded.config
  let pendingProfile: SetupResult['profile'] | null = null

  if (action.forceSetup || !config) {
    const setup = await runSetupWizard(loaded.configPath)
    config = setup.config
    pendingProfile = setup.profile
  }

  for (;;) {
    const store = createRecordStore(config.storage.databasePath)
    const ctx = createRequestContext(config.owner.username)
    if (pendingProfile) {
      updateProfile(store, ctx, pendingProfile)
      pendingProfile = null
    }

    const exit = { reconfigure: false }
    const instance = render(
      <App
        store={store}
        ctx={ctx}
        config={config}
        initialMonth={currentMonth()}
        onReconfigure={() => {
          exit.reconfigure = true
          instance.unmount()
        }}
      />
    )

    try {
      await instance.waitUntilExit()
    } finally {
      store.close()
    }

    if (!exit.reconfigure) return

    const setup = await runSetupWizard(loaded.configPath)
    config = setup.config
    pendingProfile = setup.profile
  }
}

const dispatch = (action: CliAction, context: CommandContext) => {
  switch (action.command) {
    case 'dashboard':
      return dashboardCommand(action.options, context)
    case 'analytics':
      return analyticsCommand(action.options, context)
    case 'budget':
      return budgetCommand(action.options, context)
    case 'record-add':
      return recordAddCommand(action.kind, action.options, context)
    case 'record-list':
      return recordListCommand(action.kind, action.options, context)
    case 'record-edit':
      return recordEditCommand(action.kind, action.id, action.options, context)
    case 'record-delete':
      return recordDeleteCommand(action.kind, action.id, action.options, context)
    case 'profile':
      return profileCommand(action.options, context)
    case 'report':
      return reportCommand(action.options, context)
    case 'reset':
      return resetCommand(action.options, context)
    case 'reports':
      return reportsCommand(action.options, context)
    case 'seed':
      return seedCommand(action.options, context)
  }
}

const runCliCommand = async (action: CliAction) => {
  const formatter: OutputFormatter = createFormatter(action.options.format, action.options.quiet)

  try {
    const { config, missing } = await loadConfigWithEnv({
      user: action.options.user,
      configPath: action.options.config,
    })

    if (!config) {
      formatter.error(
        `Missing required configuration: ${missing.join(', ')}`,
        `Pass --user, set ${ENV_VARS.USER}, or run 'spendly --setup' to configure.`
      )
    }

    const store = createRecordStore(config.storage.databasePath)
    try {
      dispatch(action, {
        config,
        store,
        ctx: createRequestContext(config.owner.username),
        now: new Date(),
      })
    } finally {
      store.close()
    }
  } catch (error) {
    if (isSpendlyError(error)) {
      formatter.error(error.message, error.details)
    }
    throw error
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    if (action.command === 'tui') {
      await runTuiMode(action)
    } else {
      await runCliCommand(action)
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
