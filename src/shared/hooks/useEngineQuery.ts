import { useMemo, type DependencyList } from 'react'

export type QueryState<T> = { data: T; error: null } | { data: null; error: string }

/**
 * Runs a synchronous store query during render and keeps its result until
 * a dependency changes. Failures come back as `error` for the screen to show.
 *
 * @example
 * const { data, error } = useEngineQuery(() => summarizeMonth(store, ctx, month), [month, refreshKey])
 */
export const useEngineQuery = <T>(query: () => T, deps: DependencyList): QueryState<T> =>
  useMemo((): QueryState<T> => {
    try {
      return { data: query(), error: null }
    } catch (error) {
      return { data: null, error: error instanceof Error ? error.message : String(error) }
    }
  }, deps)
