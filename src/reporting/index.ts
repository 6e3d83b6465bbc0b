/**
 * Monthly aggregation and report engine.
 *
 * Summaries, the 12-month analytics series, the dashboard and month-end
 * report artifacts. Consumed by both the CLI and the TUI.
 */

// Aggregation
export { aggregateMonth, summarizeMonth, spendingTrend, buildBreakdown } from './monthly-aggregator.js'
export { buildAnalyticsSeries, buildSeries, ANALYTICS_WINDOW_MONTHS } from './analytics-series.js'
export { buildDashboard } from './dashboard.js'

// Reports
export { generateMonthlyReport, resetMonth } from './report-generator.js'
export {
  renderArtifact,
  renderTextArtifact,
  renderJsonArtifact,
  artifactFileName,
} from './report-artifact.js'

// Types
export type {
  BreakdownEntry,
  AggregatorInput,
  MonthlySummary,
  SeriesPoint,
  SeriesTotals,
  AnalyticsSeries,
  TrendPoint,
  DashboardOptions,
  DashboardSummary,
  ArtifactFormat,
  ReportGenerationOptions,
  GeneratedReport,
  MonthResetResult,
} from './types.js'
