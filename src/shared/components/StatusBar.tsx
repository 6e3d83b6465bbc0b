import React from 'react'
import { Box, Text } from 'ink'

interface StatusBarProps {
  displayName: string
  screenTitle: string
  month: string
}

export const StatusBar = ({ displayName, screenTitle, month }: StatusBarProps) => (
  <Box borderStyle="single" borderColor="gray" paddingX={1} justifyContent="space-between">
    <Text>
      <Text bold color="green">Spendly</Text>
      <Text dimColor> · </Text>
      <Text bold>{screenTitle}</Text>
    </Text>
    <Box gap={2}>
      <Text color="yellow">{month}</Text>
      <Text dimColor>{displayName}</Text>
    </Box>
  </Box>
)
