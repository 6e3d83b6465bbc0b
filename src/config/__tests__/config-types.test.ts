import { describe, it, expect } from 'vitest'
import { appConfigSchema, storedConfigSchema, CURRENCIES } from '../config-types.js'

const minimal = {
  owner: { username: 'alice' },
  storage: { databasePath: '/data/spendly.db', reportsDir: '/data/reports' },
}

describe('appConfigSchema', () => {
  it('fills in defaults for optional sections', () => {
    const result = appConfigSchema.safeParse(minimal)

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.currency).toEqual({ code: 'PKR', symbol: '₨' })
      expect(result.data.report).toEqual({ artifactFormat: 'text' })
      expect(result.data.display).toEqual({ recentLimit: 5, trendMonths: 6 })
    }
  })

  it('trims and requires the username', () => {
    const result = appConfigSchema.safeParse({ ...minimal, owner: { username: '   ' } })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Username is required')
    }
  })

  it('rejects unknown artifact formats', () => {
    const result = appConfigSchema.safeParse({ ...minimal, report: { artifactFormat: 'pdf' } })
    expect(result.success).toBe(false)
  })

  it('bounds the display settings', () => {
    expect(appConfigSchema.safeParse({ ...minimal, display: { recentLimit: 51 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ ...minimal, display: { trendMonths: 0 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ ...minimal, display: { trendMonths: 12 } }).success).toBe(true)
  })
})

describe('storedConfigSchema', () => {
  it('accepts partial files', () => {
    expect(storedConfigSchema.safeParse({ currency: { symbol: '$' } }).success).toBe(true)
    expect(storedConfigSchema.safeParse({}).success).toBe(true)
  })

  it('rejects wrongly typed values', () => {
    expect(storedConfigSchema.safeParse({ display: { recentLimit: 'five' } }).success).toBe(false)
  })
})

describe('CURRENCIES', () => {
  it('lists PKR first with unique codes', () => {
    expect(CURRENCIES[0].code).toBe('PKR')
    expect(new Set(CURRENCIES.map((c) => c.code)).size).toBe(CURRENCIES.length)
  })
})
