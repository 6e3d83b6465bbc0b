import React from 'react'
import { Box, Text, useInput } from 'ink'

interface HelpScreenProps {
  onClose: () => void
}

const Key = ({ children }: { children: string }) => (
  <Text color="cyan" bold>{children}</Text>
)

export const HelpScreen = ({ onClose }: HelpScreenProps) => {
  useInput((input, key) => {
    if (key.escape || input === 'q' || input === '?') {
      onClose()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Spendly - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Screens</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Key>1</Key>           Dashboard</Text>
          <Text><Key>2</Key>           Analytics (12 months)</Text>
          <Text><Key>3</Key>           Budgets</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Month</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Key>h/←</Key>         Previous month</Text>
          <Text><Key>l/→</Key>         Next month</Text>
          <Text dimColor>Every screen follows the selected month</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Budgets</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Key>j/k</Key>         Move between categories (wraps)</Text>
          <Text><Key>g/G</Key>         First/last category</Text>
          <Text><Key>Enter</Key>       Edit allocation</Text>
          <Text><Key>Esc</Key>         Cancel editing</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Global</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Key>r</Key>           Refresh</Text>
          <Text><Key>S</Key>           Re-run setup</Text>
          <Text><Key>?</Key>           Show this help</Text>
          <Text><Key>q</Key>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={2}>
        <Text dimColor>Press Esc or ? to close</Text>
      </Box>
    </Box>
  )
}
