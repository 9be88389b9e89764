/**
 * Watch-time ledger types
 *
 * Persisted documents keep the field names of the JSON files on disk so that
 * existing `watch_time.json` / `last_reset.json` files keep loading.
 */

/** Bucket watch time accumulates under: a theme word or a YouTube category id */
export type WatchKey = string

/** Recurring accounting window with its own baseline and limit */
export type Period = 'daily' | 'weekly'

export const PERIODS: readonly Period[] = ['daily', 'weekly']

export function isPeriod(value: unknown): value is Period {
  return value === 'daily' || value === 'weekly'
}

/** What a limit applies to */
export type LimitTarget = { scope: 'total' } | { scope: 'key'; key: WatchKey }

export const TOTAL: LimitTarget = { scope: 'total' }

/**
 * A limit crossed by a single `record` call
 */
export type Crossing = LimitTarget & {
  period: Period
  /** Limit in seconds */
  limit: number
  /** Current-period value before the update */
  before: number
  /** Current-period value after the update */
  after: number
}

export interface PeriodLimits {
  /** Limit on the grand total, null when unlimited */
  total: number | null
  /** Per-key limits; keys without an entry are unlimited */
  categories: Record<WatchKey, number>
}

export type LimitConfig = Partial<Record<Period, PeriodLimits>>

// =============================================================================
// On-disk documents
// =============================================================================

export interface KeyTotalsDocument {
  total_time: number
  /** Number of sessions recorded under the key */
  video_count: number
}

export interface VideoTotalsDocument {
  total_time: number
  session_count: number
}

export interface ResetPointDocument {
  total_time: number
  categories: Record<WatchKey, number>
}

export interface LedgerDocument {
  total_watch_time: number
  categories: Record<WatchKey, KeyTotalsDocument>
  videos: Record<string, VideoTotalsDocument>
  reset_points: Partial<Record<Period, ResetPointDocument>>
}

/** Period → timestamp of the last reset */
export type ResetDocument = Partial<Record<Period, string>>
