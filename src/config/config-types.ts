import { z } from 'zod'

export const artifactFormatSchema = z.enum(['text', 'json'])

export const appConfigSchema = z.object({
  owner: z.object({
    username: z.string().trim().min(1, 'Username is required'),
  }),
  storage: z.object({
    databasePath: z.string().min(1),
    reportsDir: z.string().min(1),
  }),
  currency: z
    .object({
      code: z.string().min(1).default('PKR'),
      symbol: z.string().min(1).default('₨'),
    })
    .default({}),
  report: z
    .object({
      artifactFormat: artifactFormatSchema.default('text'),
    })
    .default({}),
  display: z
    .object({
      recentLimit: z.number().int().min(1).max(50).default(5),
      trendMonths: z.number().int().min(1).max(12).default(6),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof appConfigSchema>

/**
 * Shape of the config file on disk. Every section is optional so env vars
 * and flags can fill in the rest.
 */
export const storedConfigSchema = z.object({
  owner: z.object({ username: z.string() }).partial().optional(),
  storage: z.object({ databasePath: z.string(), reportsDir: z.string() }).partial().optional(),
  currency: z.object({ code: z.string(), symbol: z.string() }).partial().optional(),
  report: z.object({ artifactFormat: artifactFormatSchema }).partial().optional(),
  display: z.object({ recentLimit: z.number(), trendMonths: z.number() }).partial().optional(),
})

export type StoredConfig = z.infer<typeof storedConfigSchema>

export const CURRENCIES = [
  { code: 'PKR', symbol: '₨', label: 'Pakistani Rupee' },
  { code: 'USD', symbol: '$', label: 'US Dollar' },
  { code: 'EUR', symbol: '€', label: 'Euro' },
  { code: 'GBP', symbol: '£', label: 'British Pound' },
  { code: 'INR', symbol: '₹', label: 'Indian Rupee' },
] as const
