import type { AppConfig } from '../config/config-types.js'
import type { RecordStore } from './record-store.js'
import type { RequestContext } from './context.js'

/**
 * Props every TUI screen receives from the app shell.
 */
export interface EngineProps {
  store: RecordStore
  ctx: RequestContext
  config: AppConfig
}
