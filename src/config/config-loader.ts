import {
  defaultStoragePaths,
  getConfigPath,
  loadConfig as loadConfigFile,
} from './config-service.js'
import { appConfigSchema, type AppConfig, type StoredConfig } from './config-types.js'
import { ValidationError } from '../shared/errors.js'
import { collectFieldErrors } from '../records/record-validation.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  USER: 'SPENDLY_USER',
  DB_PATH: 'SPENDLY_DB_PATH',
  REPORTS_DIR: 'SPENDLY_REPORTS_DIR',
  CURRENCY_SYMBOL: 'SPENDLY_CURRENCY_SYMBOL',
  REPORT_FORMAT: 'SPENDLY_REPORT_FORMAT',
} as const

/**
 * Values from global CLI flags. They win over env vars and the file.
 */
export interface ConfigOverrides {
  user?: string
  configPath?: string
}

export interface LoadConfigResult {
  config: AppConfig | null
  source: 'env' | 'file' | 'mixed' | null
  missing: string[]
  configPath: string
}

type Env = Record<string, string | undefined>

/**
 * Merges file values, env vars and flag overrides (in rising priority) and
 * validates the result. Storage paths default to the config file's directory.
 */
export const resolveConfig = (
  fileConfig: StoredConfig | null,
  env: Env,
  overrides: ConfigOverrides = {},
  configPath: string = getConfigPath()
): LoadConfigResult => {
  const envUser = env[ENV_VARS.USER]
  const envDbPath = env[ENV_VARS.DB_PATH]
  const envReportsDir = env[ENV_VARS.REPORTS_DIR]
  const envSymbol = env[ENV_VARS.CURRENCY_SYMBOL]
  const envFormat = env[ENV_VARS.REPORT_FORMAT]

  const username = overrides.user || envUser || fileConfig?.owner?.username
  if (!username) {
    return { config: null, source: null, missing: [ENV_VARS.USER], configPath }
  }

  const defaults = defaultStoragePaths(configPath)
  const merged = {
    owner: { username },
    storage: {
      databasePath: envDbPath || fileConfig?.storage?.databasePath || defaults.databasePath,
      reportsDir: envReportsDir || fileConfig?.storage?.reportsDir || defaults.reportsDir,
    },
    currency: {
      code: fileConfig?.currency?.code,
      symbol: envSymbol || fileConfig?.currency?.symbol,
    },
    report: {
      artifactFormat: envFormat || fileConfig?.report?.artifactFormat,
    },
    display: {
      recentLimit: fileConfig?.display?.recentLimit,
      trendMonths: fileConfig?.display?.trendMonths,
    },
  }

  const validated = appConfigSchema.safeParse(merged)
  if (!validated.success) {
    throw new ValidationError('Invalid configuration', collectFieldErrors(validated.error))
  }

  const usedEnv = [overrides.user, envUser, envDbPath, envReportsDir, envSymbol, envFormat].some(Boolean)
  const source = fileConfig ? (usedEnv ? 'mixed' : 'file') : 'env'

  return { config: validated.data, source, missing: [], configPath }
}

/**
 * Load config from the config file, with env var and flag overrides.
 */
export const loadConfigWithEnv = async (
  overrides: ConfigOverrides = {},
  env: Env = process.env
): Promise<LoadConfigResult> => {
  const configPath = overrides.configPath ?? getConfigPath()
  const fileConfig = await loadConfigFile(configPath)
  return resolveConfig(fileConfig, env, overrides, configPath)
}
