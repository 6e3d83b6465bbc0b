import React from 'react'
import { Box, Text } from 'ink'

export interface KeyHint {
  key: string
  label: string
}

interface KeyHintsProps {
  hints: readonly KeyHint[]
  /** Dimmed text on the right, e.g. a list position */
  aside?: string
}

export const KeyHints = ({ hints, aside }: KeyHintsProps) => (
  <Box marginTop={1} justifyContent="space-between">
    <Box gap={2} flexWrap="wrap">
      {hints.map(({ key, label }) => (
        <Text key={key}>
          <Text color="cyan" bold>{key}</Text>
          <Text dimColor> {label}</Text>
        </Text>
      ))}
    </Box>
    {aside && <Text dimColor>{aside}</Text>}
  </Box>
)
