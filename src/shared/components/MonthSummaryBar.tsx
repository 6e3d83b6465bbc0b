import React from 'react'
import { Box, Text } from 'ink'
import { formatCompact } from '../money.js'
import type { MonthlySummary } from '../../reporting/types.js'

interface MonthSummaryBarProps {
  summary: MonthlySummary
  currencySymbol: string
}

export const MonthSummaryBar = ({ summary, currencySymbol }: MonthSummaryBarProps) => {
  const money = (value: number) => formatCompact(value, currencySymbol)
  const topCategory = summary.expensesByCategory[0]

  return (
    <Box paddingX={1} gap={3} borderStyle="single" borderColor="gray" borderTop={false} borderLeft={false} borderRight={false}>
      <Box gap={1}>
        <Text dimColor>Income:</Text>
        <Text color="green" bold>{money(summary.totalIncome)}</Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Spent:</Text>
        <Text color="red" bold>{money(summary.totalExpenses)}</Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Invested:</Text>
        <Text color="blue" bold>{money(summary.totalInvestments)}</Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Saved:</Text>
        <Text color={summary.totalSavings >= 0 ? 'green' : 'red'} bold>
          {money(summary.totalSavings)}
        </Text>
      </Box>

      {topCategory && (
        <Box gap={1}>
          <Text dimColor>Top:</Text>
          <Text color="yellow">{topCategory.key}</Text>
          <Text dimColor>({money(topCategory.total)})</Text>
        </Box>
      )}
    </Box>
  )
}
