import type { AppConfig } from '../../config/config-types.js'
import type { RecordStore } from '../../shared/record-store.js'
import type { RequestContext } from '../../shared/context.js'
import { currentMonth } from '../../shared/dates.js'

/**
 * What every command needs besides its own options. Built once per run.
 */
export interface CommandContext {
  config: AppConfig
  store: RecordStore
  ctx: RequestContext
  now: Date
}

/**
 * The month a command targets: `--month` when given, else the current one.
 */
export const resolveMonth = (month: string | undefined, now: Date): string =>
  month ?? currentMonth(now)
