import { describe, it, expect } from 'vitest'
import { createStore } from 'jotai'
import {
  currentScreenAtom,
  goBackAtom,
  navigateAtom,
  refreshAtom,
  refreshKeyAtom,
  selectedMonthAtom,
  shiftSelectedMonthAtom,
} from '../navigation-atoms.js'

describe('navigation atoms', () => {
  it('returns from help to the screen it was opened on', () => {
    const store = createStore()

    store.set(navigateAtom, 'budgets')
    store.set(navigateAtom, 'help')
    store.set(goBackAtom)

    expect(store.get(currentScreenAtom)).toBe('budgets')
  })

  it('moves the selected month across year boundaries', () => {
    const store = createStore()
    store.set(selectedMonthAtom, '2024-01')

    store.set(shiftSelectedMonthAtom, -1)
    expect(store.get(selectedMonthAtom)).toBe('2023-12')

    store.set(shiftSelectedMonthAtom, 2)
    expect(store.get(selectedMonthAtom)).toBe('2024-02')
  })

  it('bumps the refresh key', () => {
    const store = createStore()

    store.set(refreshAtom)
    store.set(refreshAtom)

    expect(store.get(refreshKeyAtom)).toBe(2)
  })
})
