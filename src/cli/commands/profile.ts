import type { ProfileOptions } from '../args.js'
import { createFormatter } from '../output.js'
import type { CommandContext } from './command-context.js'
import { formatMoney } from '../../shared/money.js'
import type { Profile } from '../../records/record-types.js'
import { displayName, getOrCreateProfile, updateProfile } from '../../profile/profile-service.js'

export const formatTextProfile = (profile: Profile, symbol: string): string =>
  [
    `  Name:           ${displayName(profile, profile.owner)}`,
    `  Username:       ${profile.owner}`,
    `  Monthly Salary: ${formatMoney(profile.monthlySalary, symbol)}`,
    `  Phone:          ${profile.phoneNumber || '-'}`,
    `  Date of Birth:  ${profile.dateOfBirth ?? '-'}`,
    `  Address:        ${profile.address || '-'}`,
  ].join('\n')

/**
 * Shows the profile, or updates the fields given as flags.
 *
 * @example
 * spendly profile --salary 5200 --name "Ayesha Khan"
 */
export const profileCommand = (options: ProfileOptions, context: CommandContext): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const { store, ctx, now, config } = context

  const changes = {
    fullName: options.name,
    monthlySalary: options.salary,
    phoneNumber: options.phone,
    dateOfBirth: options.dob,
    address: options.address,
  }
  const hasChanges = Object.values(changes).some((value) => value !== undefined)

  const profile = hasChanges
    ? updateProfile(store, ctx, changes, now)
    : getOrCreateProfile(store, ctx, now)

  if (hasChanges) formatter.progress('Profile updated')

  formatter.success({
    success: true,
    profile,
    ...(options.format === 'text'
      ? { formatted: formatTextProfile(profile, config.currency.symbol) }
      : {}),
  })
}
