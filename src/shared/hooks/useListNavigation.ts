import { useState } from 'react'
import { useInput } from 'ink'

interface UseListNavigationOptions {
  itemCount: number
  /** Cursor keys are ignored while false (e.g. during inline edits) */
  enabled?: boolean
}

interface UseListNavigationResult {
  selectedIndex: number
  /** "3/8", or "0/0" for an empty list */
  positionDisplay: string
  isSelected: (index: number) => boolean
}

/**
 * Cursor over a short fixed list. j/k and the arrows move one row and wrap
 * at either end; g and G jump to the first and last row.
 *
 * @example
 * const { selectedIndex, isSelected } = useListNavigation({
 *   itemCount: rows.length,
 *   enabled: !isEditing,
 * })
 */
export const useListNavigation = ({
  itemCount,
  enabled = true,
}: UseListNavigationOptions): UseListNavigationResult => {
  const [cursor, setCursor] = useState(0)
  // The list can shrink under the cursor between renders
  const selectedIndex = itemCount === 0 ? 0 : Math.min(cursor, itemCount - 1)

  useInput(
    (input, key) => {
      if (itemCount === 0) return
      if (input === 'j' || key.downArrow) setCursor((selectedIndex + 1) % itemCount)
      else if (input === 'k' || key.upArrow) setCursor((selectedIndex - 1 + itemCount) % itemCount)
      else if (input === 'g') setCursor(0)
      else if (input === 'G') setCursor(itemCount - 1)
    },
    { isActive: enabled }
  )

  return {
    selectedIndex,
    positionDisplay: itemCount > 0 ? `${selectedIndex + 1}/${itemCount}` : '0/0',
    isSelected: (index) => index === selectedIndex,
  }
}
