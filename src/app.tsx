import React from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { Provider, createStore, useAtomValue, useSetAtom } from 'jotai'

import {
  currentScreenAtom,
  goBackAtom,
  isEditingAtom,
  navigateAtom,
  refreshAtom,
  SCREEN_TITLES,
  selectedMonthAtom,
  shiftSelectedMonthAtom,
} from './navigation/navigation-atoms.js'
import { DashboardScreen } from './dashboard/DashboardScreen.js'
import { AnalyticsScreen } from './analytics/AnalyticsScreen.js'
import { BudgetScreen } from './budgets/BudgetScreen.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import { StatusBar } from './shared/components/StatusBar.js'
import { displayName } from './profile/profile-service.js'
import type { EngineProps } from './shared/engine-props.js'

interface AppContentProps extends EngineProps {
  onReconfigure: () => void
}

const AppContent = ({ store, ctx, config, onReconfigure }: AppContentProps) => {
  const { exit } = useApp()
  const screen = useAtomValue(currentScreenAtom)
  const month = useAtomValue(selectedMonthAtom)
  const isEditing = useAtomValue(isEditingAtom)
  const navigate = useSetAtom(navigateAtom)
  const goBack = useSetAtom(goBackAtom)
  const shiftMonth = useSetAtom(shiftSelectedMonthAtom)
  const refresh = useSetAtom(refreshAtom)

  // Global keys; the help screen and text inputs handle their own
  useInput(
    (input, key) => {
      if (input === 'q') exit()
      else if (input === '?') navigate('help')
      else if (input === '1') navigate('dashboard')
      else if (input === '2') navigate('analytics')
      else if (input === '3') navigate('budgets')
      else if (input === 'h' || key.leftArrow) shiftMonth(-1)
      else if (input === 'l' || key.rightArrow) shiftMonth(1)
      else if (input === 'r') refresh()
      else if (input === 'S') onReconfigure()
    },
    { isActive: !isEditing && screen !== 'help' }
  )

  const props = { store, ctx, config }

  const body = (() => {
    switch (screen) {
      case 'dashboard':
        return <DashboardScreen {...props} />
      case 'analytics':
        return <AnalyticsScreen {...props} />
      case 'budgets':
        return <BudgetScreen {...props} />
      case 'help':
        return <HelpScreen onClose={() => goBack()} />
      default:
        return <Text>Unknown screen: {screen}</Text>
    }
  })()

  return (
    <Box flexDirection="column">
      <StatusBar
        displayName={displayName(store.getProfile(ctx.ownerId), ctx.ownerId)}
        screenTitle={SCREEN_TITLES[screen]}
        month={month}
      />
      {body}
    </Box>
  )
}

interface AppProps extends EngineProps {
  initialMonth: string
  onReconfigure: () => void
}

export const App = ({ initialMonth, ...props }: AppProps) => {
  const atoms = React.useMemo(() => {
    const atomStore = createStore()
    atomStore.set(selectedMonthAtom, initialMonth)
    return atomStore
  }, [initialMonth])

  return (
    <Provider store={atoms}>
      <Box flexDirection="column">
        <AppContent {...props} />
      </Box>
    </Provider>
  )
}
