import * as p from '@clack/prompts'
import { CURRENCIES, type AppConfig } from './config-types.js'
import { defaultStoragePaths, getConfigPath, saveConfig } from './config-service.js'
import { parseAmount } from '../shared/money.js'

export interface SetupResult {
  config: AppConfig
  /** Profile values to apply once the store is open. Blank answers are left out. */
  profile: { fullName?: string; monthlySalary?: string }
}

const cancelled = (): never => {
  p.cancel('Setup cancelled')
  process.exit(0)
}

/**
 * Interactive setup wizard for first-time configuration.
 * Collects the username, display name, monthly salary and currency.
 */
export const runSetupWizard = async (configPath: string = getConfigPath()): Promise<SetupResult> => {
  p.intro('Welcome to Spendly')

  const username = await p.text({
    message: 'Choose a username',
    placeholder: 'e.g., ayesha',
    validate: (value) => {
      if (!value.trim()) return 'Username is required'
      if (!/^[A-Za-z0-9_.-]+$/.test(value.trim())) return 'Use letters, digits, dots, dashes or underscores'
    },
  })
  if (p.isCancel(username)) return cancelled()

  const fullName = await p.text({
    message: 'Your name (shown on reports)',
    placeholder: 'Optional',
    defaultValue: '',
  })
  if (p.isCancel(fullName)) return cancelled()

  const monthlySalary = await p.text({
    message: 'Monthly salary',
    placeholder: 'e.g., 5200 (blank keeps the current value)',
    defaultValue: '',
    validate: (value) => {
      if (value && parseAmount(value) === null) return 'Enter a non-negative amount with at most two decimals'
    },
  })
  if (p.isCancel(monthlySalary)) return cancelled()

  const currencyCode = await p.select({
    message: 'Currency',
    options: CURRENCIES.map((c) => ({
      value: c.code,
      label: `${c.symbol} ${c.label}`,
      hint: c.code,
    })),
  })
  if (p.isCancel(currencyCode)) return cancelled()

  const currency = CURRENCIES.find((c) => c.code === currencyCode) ?? CURRENCIES[0]

  const config: AppConfig = {
    owner: { username: username.trim() },
    storage: defaultStoragePaths(configPath),
    currency: { code: currency.code, symbol: currency.symbol },
    report: { artifactFormat: 'text' },
    display: { recentLimit: 5, trendMonths: 6 },
  }

  await saveConfig(config, configPath)

  p.outro('Setup complete! Launching Spendly...')

  const profile: SetupResult['profile'] = {}
  if (fullName.trim()) profile.fullName = fullName.trim()
  if (monthlySalary.trim()) profile.monthlySalary = monthlySalary.trim()

  return { config, profile }
}
