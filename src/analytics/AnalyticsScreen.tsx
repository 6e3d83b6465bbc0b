import React from 'react'
import { Box, Text } from 'ink'
import { useAtomValue } from 'jotai'
import { refreshKeyAtom, selectedMonthAtom } from '../navigation/navigation-atoms.js'
import { buildAnalyticsSeries } from '../reporting/analytics-series.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { useEngineQuery } from '../shared/hooks/useEngineQuery.js'
import { formatCompact } from '../shared/money.js'
import type { EngineProps } from '../shared/engine-props.js'

const HINTS = [
  { key: '1/2/3', label: 'screens' },
  { key: 'h/l', label: 'move window' },
  { key: '?', label: 'help' },
  { key: 'q', label: 'quit' },
] as const

const COLUMN = 12

export const AnalyticsScreen = ({ store, ctx, config }: EngineProps) => {
  const month = useAtomValue(selectedMonthAtom)
  const refreshKey = useAtomValue(refreshKeyAtom)
  const money = (value: number) => formatCompact(value, config.currency.symbol)

  const { data: series, error } = useEngineQuery(
    () => buildAnalyticsSeries(store, ctx, month),
    [store, ctx, month, refreshKey]
  )

  if (!series) {
    return <Text color="red">Could not load analytics: {error}</Text>
  }

  const maxSpend = Math.max(1, ...series.points.map((p) => p.expenses + p.investments))

  return (
    <Box flexDirection="column">
      <Box marginTop={1}>
        <Text bold>
          {'Month'.padEnd(9)}
          {'Income'.padStart(COLUMN)}
          {'Expenses'.padStart(COLUMN)}
          {'Invested'.padStart(COLUMN)}
          {'Savings'.padStart(COLUMN)}
        </Text>
      </Box>
      {series.points.map((p) => (
        <Text key={p.month}>
          <Text color={p.month === month ? 'yellow' : undefined}>{p.month.padEnd(9)}</Text>
          <Text color="green">{money(p.income).padStart(COLUMN)}</Text>
          <Text color="red">{money(p.expenses).padStart(COLUMN)}</Text>
          <Text color="blue">{money(p.investments).padStart(COLUMN)}</Text>
          <Text color={p.savings >= 0 ? 'green' : 'red'}>{money(p.savings).padStart(COLUMN)}</Text>
          <Text dimColor>  {'▇'.repeat(Math.round(((p.expenses + p.investments) / maxSpend) * 16))}</Text>
        </Text>
      ))}
      <Text bold>
        {'Total'.padEnd(9)}
        {money(series.totals.income).padStart(COLUMN)}
        {money(series.totals.expenses).padStart(COLUMN)}
        {money(series.totals.investments).padStart(COLUMN)}
        {money(series.totals.savings).padStart(COLUMN)}
      </Text>

      <Box marginTop={1} gap={2}>
        <Text dimColor>Savings rate:</Text>
        <Text bold color={series.savingsRate >= 0 ? 'green' : 'red'}>
          {series.savingsRate.toFixed(1)}%
        </Text>
      </Box>

      <Box marginTop={1} gap={4}>
        <Box flexDirection="column" width={40}>
          <Text bold>Expenses by category</Text>
          {series.expensesByCategory.length === 0 && <Text dimColor>None in this window</Text>}
          {series.expensesByCategory.map((e) => (
            <Text key={e.key}>
              {e.key.padEnd(14)}
              {money(e.total).padStart(10)}
              <Text dimColor> {e.percentOfTotal.toFixed(1)}%</Text>
            </Text>
          ))}
        </Box>
        <Box flexDirection="column">
          <Text bold>Investments by type</Text>
          {series.investmentsByType.length === 0 && <Text dimColor>None in this window</Text>}
          {series.investmentsByType.map((e) => (
            <Text key={e.key}>
              {e.key.padEnd(14)}
              {money(e.total).padStart(10)}
              <Text dimColor> {e.percentOfTotal.toFixed(1)}%</Text>
            </Text>
          ))}
        </Box>
      </Box>

      <KeyHints hints={HINTS} />
    </Box>
  )
}
