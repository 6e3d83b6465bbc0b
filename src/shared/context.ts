/**
 * Per-call context. Every engine operation receives the owner explicitly.
 */
export interface RequestContext {
  readonly ownerId: string
}

export const createRequestContext = (ownerId: string): RequestContext => {
  const trimmed = ownerId.trim()
  if (!trimmed) {
    throw new Error('An owner is required. Pass --user or set SPENDLY_USER.')
  }
  return { ownerId: trimmed }
}
