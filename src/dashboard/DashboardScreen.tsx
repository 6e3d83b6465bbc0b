import React from 'react'
import { Box, Text } from 'ink'
import { useAtomValue } from 'jotai'
import { refreshKeyAtom, selectedMonthAtom } from '../navigation/navigation-atoms.js'
import { buildDashboard } from '../reporting/dashboard.js'
import { MonthSummaryBar } from '../shared/components/MonthSummaryBar.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { useEngineQuery } from '../shared/hooks/useEngineQuery.js'
import { formatCompact } from '../shared/money.js'
import { dayKeyOf } from '../shared/dates.js'
import { progressBar } from '../cli/output.js'
import type { EngineProps } from '../shared/engine-props.js'

const HINTS = [
  { key: '1/2/3', label: 'screens' },
  { key: 'h/l', label: 'month' },
  { key: 'r', label: 'refresh' },
  { key: '?', label: 'help' },
  { key: 'q', label: 'quit' },
] as const

const usageColor = (percentUsed: number, isOverBudget: boolean) =>
  isOverBudget ? 'red' : percentUsed > 80 ? 'yellow' : 'green'

export const DashboardScreen = ({ store, ctx, config }: EngineProps) => {
  const month = useAtomValue(selectedMonthAtom)
  const refreshKey = useAtomValue(refreshKeyAtom)
  const symbol = config.currency.symbol
  const money = (value: number) => formatCompact(value, symbol)

  const { data, error } = useEngineQuery(
    () =>
      buildDashboard(store, ctx, {
        month,
        recentLimit: config.display.recentLimit,
        trendMonths: config.display.trendMonths,
      }),
    [store, ctx, month, refreshKey, config.display.recentLimit, config.display.trendMonths]
  )

  if (!data) {
    return <Text color="red">Could not load the dashboard: {error}</Text>
  }

  const maxTrend = Math.max(1, ...data.spendingTrend.map((p) => p.expenses))

  return (
    <Box flexDirection="column">
      <MonthSummaryBar summary={data.summary} currencySymbol={symbol} />

      <Box marginTop={1} gap={4}>
        <Box flexDirection="column" width={48}>
          <Text bold>Budgets{data.budgetMonth && data.budgetMonth !== month ? ` (${data.budgetMonth})` : ''}</Text>
          {data.budgets.length === 0 && <Text dimColor>No budgets set yet. Press 3 to add some.</Text>}
          {data.budgets.map((b) => (
            <Text key={b.category}>
              {b.category.padEnd(14)}
              <Text color={usageColor(b.percentUsed, b.isOverBudget)}>{progressBar(b.percentUsed)}</Text>
              {` ${b.percentUsed.toFixed(0).padStart(3)}% `}
              <Text dimColor>{money(b.remaining)} left</Text>
            </Text>
          ))}
        </Box>

        <Box flexDirection="column">
          <Text bold>Spending trend</Text>
          {data.spendingTrend.map((p) => (
            <Text key={p.month}>
              <Text dimColor>{p.month} </Text>
              <Text color={p.month === month ? 'yellow' : 'red'}>
                {'█'.repeat(Math.round((p.expenses / maxTrend) * 20)).padEnd(20)}
              </Text>
              {` ${money(p.expenses)}`}
            </Text>
          ))}
        </Box>
      </Box>

      <Box marginTop={1} gap={4}>
        <Box flexDirection="column" width={48}>
          <Text bold>Recent expenses</Text>
          {data.recentExpenses.length === 0 && <Text dimColor>None yet</Text>}
          {data.recentExpenses.map((e) => (
            <Text key={e.id}>
              <Text dimColor>{dayKeyOf(e.occurredAt)} </Text>
              {e.category.padEnd(14)}
              <Text color="red">{money(e.amount).padStart(10)}</Text>
              <Text dimColor> {e.description.slice(0, 12)}</Text>
            </Text>
          ))}
        </Box>

        <Box flexDirection="column">
          <Text bold>Recent investments</Text>
          {data.recentInvestments.length === 0 && <Text dimColor>None yet</Text>}
          {data.recentInvestments.map((i) => (
            <Text key={i.id}>
              <Text dimColor>{dayKeyOf(i.occurredAt)} </Text>
              {i.investmentType.padEnd(14)}
              <Text color="blue">{money(i.amount).padStart(10)}</Text>
            </Text>
          ))}
        </Box>
      </Box>

      <KeyHints hints={HINTS} />
    </Box>
  )
}
