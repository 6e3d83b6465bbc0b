export { dashboardCommand } from './dashboard.js'
export { analyticsCommand } from './analytics.js'
export { budgetCommand } from './budget.js'
export {
  recordAddCommand,
  recordListCommand,
  recordEditCommand,
  recordDeleteCommand,
} from './records.js'
export { profileCommand } from './profile.js'
export { reportCommand, reportsCommand, resetCommand } from './report.js'
export { seedCommand } from './seed.js'
export type { CommandContext } from './command-context.js'
