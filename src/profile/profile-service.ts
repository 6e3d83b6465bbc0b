import type { RecordStore } from '../shared/record-store.js'
import type { RequestContext } from '../shared/context.js'
import { ValidationError } from '../shared/errors.js'
import { validateProfileInput } from '../records/record-validation.js'
import type { Profile } from '../records/record-types.js'

const emptyProfile = (owner: string, now: Date): Profile => ({
  owner,
  fullName: '',
  monthlySalary: 0,
  phoneNumber: '',
  dateOfBirth: null,
  address: '',
  createdAt: now.toISOString(),
  updatedAt: now.toISOString(),
})

/**
 * Loads the owner's profile, creating an empty one (salary 0) on first use.
 */
export const getOrCreateProfile = (
  store: RecordStore,
  ctx: RequestContext,
  now: Date = new Date()
): Profile => store.getProfile(ctx.ownerId) ?? store.saveProfile(emptyProfile(ctx.ownerId, now))

/**
 * Applies the given profile fields. Fields left out keep their value;
 * `dateOfBirth: null` clears the date.
 */
export const updateProfile = (
  store: RecordStore,
  ctx: RequestContext,
  raw: unknown,
  now: Date = new Date()
): Profile => {
  const result = validateProfileInput(raw)
  if (!result.success) {
    throw new ValidationError('Invalid profile', result.fieldErrors)
  }

  const current = getOrCreateProfile(store, ctx, now)
  const changes = result.data
  return store.saveProfile({
    ...current,
    fullName: changes.fullName ?? current.fullName,
    monthlySalary: changes.monthlySalary ?? current.monthlySalary,
    phoneNumber: changes.phoneNumber ?? current.phoneNumber,
    dateOfBirth: changes.dateOfBirth === undefined ? current.dateOfBirth : changes.dateOfBirth,
    address: changes.address ?? current.address,
    updatedAt: now.toISOString(),
  })
}

/**
 * Full name when set, otherwise the owner id.
 */
export const displayName = (profile: Profile | null, owner: string): string =>
  profile?.fullName.trim() || owner
