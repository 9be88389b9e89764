/**
 * Threshold Evaluator
 *
 * Edge-triggered: a limit is crossed only by the update that takes the
 * current-period value from at-or-under the limit to strictly over it.
 */

import type { Crossing, LimitConfig, LimitTarget, Period } from './types'

export function crosses(before: number, after: number, limit: number | null | undefined): boolean {
  if (limit === null || limit === undefined) return false
  return before <= limit && limit < after
}

export function limitFor(limits: LimitConfig, period: Period, target: LimitTarget): number | null {
  const periodLimits = limits[period]
  if (!periodLimits) return null
  if (target.scope === 'total') return periodLimits.total
  return Object.hasOwn(periodLimits.categories, target.key) ? periodLimits.categories[target.key] : null
}

/**
 * Build the crossing for `target` in `period`, or null when the update stayed
 * on the same side of the limit (or there is no limit).
 */
export function evaluateCrossing(
  limits: LimitConfig,
  period: Period,
  target: LimitTarget,
  before: number,
  after: number
): Crossing | null {
  const limit = limitFor(limits, period, target)
  if (limit === null || !crosses(before, after, limit)) return null
  return { ...target, period, limit, before, after }
}
