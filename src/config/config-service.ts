import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { storedConfigSchema, type AppConfig, type StoredConfig } from './config-types.js'
import { ConfigError } from '../shared/errors.js'

const CONFIG_DIR = join(homedir(), '.config', 'spendly')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Database and reports directory beside the given config file.
 */
export const defaultStoragePaths = (configPath: string = CONFIG_FILE) => ({
  databasePath: join(dirname(configPath), 'spendly.db'),
  reportsDir: join(dirname(configPath), 'reports'),
})

/**
 * Reads the config file. Returns null when there is none; throws a
 * ConfigError when it is not valid JSON or has the wrong shape.
 */
export const loadConfig = async (path: string = CONFIG_FILE): Promise<StoredConfig | null> => {
  if (!existsSync(path)) return null

  const content = await readFile(path, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, path, { cause: error })
  }

  const parsed = storedConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Config file ${path} is invalid: ${issues}`, path)
  }
  return parsed.data
}

export const saveConfig = async (config: AppConfig, path: string = CONFIG_FILE): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(config, null, 2))
}
