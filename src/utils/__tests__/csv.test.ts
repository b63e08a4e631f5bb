import { describe, it, expect } from 'vitest'
import { parseCsv, toInteger, toNumber } from '../csv'

describe('parseCsv', () => {
  it('keeps the header as columns', () => {
    const rows = parseCsv('country,year\nLaos,2001\n')
    expect(rows.columns).toEqual(['country', 'year'])
    expect(rows).toHaveLength(1)
    expect(rows[0]?.country).toBe('Laos')
  })
})

describe('toNumber', () => {
  it('parses trimmed decimals', () => {
    expect(toNumber(' 1.5 ')).toBe(1.5)
  })

  it('returns null for blank, partial and non-finite values', () => {
    expect(toNumber('')).toBeNull()
    expect(toNumber('abc')).toBeNull()
    expect(toNumber('1.8x')).toBeNull()
    expect(toNumber('Infinity')).toBeNull()
  })
})

describe('toInteger', () => {
  it('accepts whole numbers only', () => {
    expect(toInteger('2020')).toBe(2020)
    expect(toInteger('2020.0')).toBe(2020)
    expect(toInteger('2020.5')).toBeNull()
  })
})
