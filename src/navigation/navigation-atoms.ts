import { atom } from 'jotai'
import { shiftMonth } from '../shared/dates.js'

export type Screen = 'dashboard' | 'analytics' | 'budgets' | 'help'

export const SCREEN_TITLES: Record<Screen, string> = {
  dashboard: 'Dashboard',
  analytics: 'Analytics',
  budgets: 'Budgets',
  help: 'Help',
}

export const currentScreenAtom = atom<Screen>('dashboard')
export const previousScreenAtom = atom<Screen>('dashboard')

/** Month every screen shows, YYYY-MM. Set once at startup. */
export const selectedMonthAtom = atom('')

/** Bumped after writes so screens re-read the store */
export const refreshKeyAtom = atom(0)

/** True while a text input owns the keyboard */
export const isEditingAtom = atom(false)

// Navigation actions
export const navigateAtom = atom(null, (get, set, screen: Screen) => {
  const current = get(currentScreenAtom)
  if (current !== 'help') set(previousScreenAtom, current)
  set(currentScreenAtom, screen)
})

export const goBackAtom = atom(null, (get, set) => {
  set(currentScreenAtom, get(previousScreenAtom))
})

export const shiftSelectedMonthAtom = atom(null, (get, set, delta: number) => {
  set(selectedMonthAtom, shiftMonth(get(selectedMonthAtom), delta))
})

export const refreshAtom = atom(null, (get, set) => {
  set(refreshKeyAtom, get(refreshKeyAtom) + 1)
})
