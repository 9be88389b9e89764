import { describe, test, expect } from 'vitest'
import { crosses, evaluateCrossing, limitFor } from './threshold'
import { TOTAL, type LimitConfig } from './types'

const LIMITS: LimitConfig = {
  daily: { total: 7200, categories: { '20': 1800 } },
}

describe('crosses', () => {
  test('fires when the update goes from at-or-under to over', () => {
    expect(crosses(1700, 1900, 1800)).toBe(true)
    expect(crosses(1800, 1801, 1800)).toBe(true)
  })

  test('reaching the limit exactly does not exceed it', () => {
    expect(crosses(1700, 1800, 1800)).toBe(false)
  })

  test('zero duration never crosses', () => {
    expect(crosses(1800, 1800, 1800)).toBe(false)
  })

  test('already over does not cross again', () => {
    expect(crosses(1801, 1900, 1800)).toBe(false)
  })

  test('no limit never crosses', () => {
    expect(crosses(0, 1_000_000, null)).toBe(false)
    expect(crosses(0, 1_000_000, undefined)).toBe(false)
  })
})

describe('limitFor', () => {
  test('looks up total and key limits', () => {
    expect(limitFor(LIMITS, 'daily', TOTAL)).toBe(7200)
    expect(limitFor(LIMITS, 'daily', { scope: 'key', key: '20' })).toBe(1800)
  })

  test('missing entries are unlimited', () => {
    expect(limitFor(LIMITS, 'daily', { scope: 'key', key: '10' })).toBeNull()
    expect(limitFor(LIMITS, 'weekly', TOTAL)).toBeNull()
  })

  test('ignores inherited properties', () => {
    expect(limitFor(LIMITS, 'daily', { scope: 'key', key: 'toString' })).toBeNull()
  })
})

describe('evaluateCrossing', () => {
  test('describes the crossing', () => {
    expect(evaluateCrossing(LIMITS, 'daily', { scope: 'key', key: '20' }, 1700, 1900)).toEqual({
      scope: 'key',
      key: '20',
      period: 'daily',
      limit: 1800,
      before: 1700,
      after: 1900,
    })
  })

  test('returns null without a crossing', () => {
    expect(evaluateCrossing(LIMITS, 'daily', TOTAL, 1700, 1900)).toBeNull()
    expect(evaluateCrossing(LIMITS, 'weekly', TOTAL, 0, 99999)).toBeNull()
  })
})
