import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { useAtom, useAtomValue, useSetAtom } from 'jotai'
import {
  isEditingAtom,
  refreshAtom,
  refreshKeyAtom,
  selectedMonthAtom,
} from '../navigation/navigation-atoms.js'
import { budgetOverview, setBudget } from './budget-service.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { useEngineQuery } from '../shared/hooks/useEngineQuery.js'
import { useListNavigation } from '../shared/hooks/useListNavigation.js'
import { formatMoney } from '../shared/money.js'
import { ValidationError } from '../shared/errors.js'
import { progressBar } from '../cli/output.js'
import type { EngineProps } from '../shared/engine-props.js'

const HINTS = [
  { key: 'j/k', label: 'navigate' },
  { key: 'Enter', label: 'edit allocation' },
  { key: 'h/l', label: 'month' },
  { key: '?', label: 'help' },
  { key: 'q', label: 'quit' },
] as const

const EDIT_HINTS = [
  { key: 'Enter', label: 'save' },
  { key: 'Esc', label: 'cancel' },
] as const

const errorMessage = (error: unknown): string => {
  if (error instanceof ValidationError) {
    return Object.values(error.fieldErrors).flat().join('; ')
  }
  if (error instanceof Error) return error.message
  return String(error)
}

export const BudgetScreen = ({ store, ctx, config }: EngineProps) => {
  const month = useAtomValue(selectedMonthAtom)
  const refreshKey = useAtomValue(refreshKeyAtom)
  const refresh = useSetAtom(refreshAtom)
  const [isEditing, setIsEditing] = useAtom(isEditingAtom)
  const [draft, setDraft] = useState('')
  const [message, setMessage] = useState<{ text: string; color: 'red' | 'green' } | null>(null)
  const money = (value: number) => formatMoney(value, config.currency.symbol)

  const { data: rows, error } = useEngineQuery(
    () => budgetOverview(store, ctx, month),
    [store, ctx, month, refreshKey]
  )

  const { selectedIndex, isSelected, positionDisplay } = useListNavigation({
    itemCount: rows?.length ?? 0,
    enabled: !isEditing,
  })

  const selected = rows?.[selectedIndex]

  useInput(
    (_input, key) => {
      if (key.return && selected) {
        setDraft(selected.hasBudget ? (selected.allocated / 100).toFixed(2) : '')
        setMessage(null)
        setIsEditing(true)
      }
    },
    { isActive: !isEditing }
  )

  useInput(
    (_input, key) => {
      if (key.escape) setIsEditing(false)
    },
    { isActive: isEditing }
  )

  const handleSubmit = (value: string) => {
    if (!selected) return
    try {
      const saved = setBudget(store, ctx, {
        category: selected.category,
        monthKey: month,
        allocatedAmount: value,
      })
      setMessage({ text: `${saved.category} set to ${money(saved.allocatedAmount)}`, color: 'green' })
      setIsEditing(false)
      refresh()
    } catch (err) {
      setMessage({ text: errorMessage(err), color: 'red' })
    }
  }

  if (!rows) {
    return <Text color="red">Could not load budgets: {error}</Text>
  }

  return (
    <Box flexDirection="column">
      <Box marginTop={1}>
        <Text bold>
          {'  '}
          {'Category'.padEnd(14)}
          {'Allocated'.padStart(14)}
          {'Spent'.padStart(14)}
          {'Remaining'.padStart(14)}
          {'  Used'}
        </Text>
      </Box>

      {rows.map((row, index) => {
        const active = isSelected(index)
        return (
          <Box key={row.category}>
            <Text color={active ? 'cyan' : undefined} bold={active}>
              {active ? '› ' : '  '}
              {row.category.padEnd(14)}
            </Text>
            {active && isEditing ? (
              <Box width={14} justifyContent="flex-end">
                <TextInput value={draft} onChange={setDraft} onSubmit={handleSubmit} placeholder="0.00" />
              </Box>
            ) : (
              <Text dimColor={!row.hasBudget}>
                {(row.hasBudget ? money(row.allocated) : '-').padStart(14)}
              </Text>
            )}
            <Text>{money(row.spent).padStart(14)}</Text>
            <Text color={row.remaining < 0 ? 'red' : undefined}>
              {(row.hasBudget ? money(row.remaining) : '-').padStart(14)}
            </Text>
            {row.hasBudget && (
              <Text color={row.isOverBudget ? 'red' : row.percentUsed > 80 ? 'yellow' : 'green'}>
                {'  '}
                {progressBar(row.percentUsed)} {row.percentUsed.toFixed(1)}%
              </Text>
            )}
          </Box>
        )
      })}

      {message && (
        <Box marginTop={1}>
          <Text color={message.color}>{message.text}</Text>
        </Box>
      )}

      <KeyHints hints={isEditing ? EDIT_HINTS : HINTS} aside={positionDisplay} />
    </Box>
  )
}
