/**
 * Reset Scheduler
 *
 * Tracks the last reset instant per period and decides when a new period
 * starts. Daily periods roll over on calendar dates in a single time zone
 * fixed for the process; weekly periods are a sliding 7-day window from the
 * last reset.
 */

import { isPeriod, type Period, type ResetDocument } from './types'

const WEEK_MS = 7 * 24 * 60 * 60 * 1000

/** Time zone the process runs in, used when none is configured */
export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

const dateFormats = new Map<string, Intl.DateTimeFormat>()

/**
 * Calendar date of `instant` in `timeZone` as YYYY-MM-DD
 */
export function calendarDate(instant: Date, timeZone: string): string {
  let fmt = dateFormats.get(timeZone)
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    })
    dateFormats.set(timeZone, fmt)
  }

  const parts: Record<string, string> = {}
  for (const part of fmt.formatToParts(instant)) {
    parts[part.type] = part.value
  }
  return `${parts.year}-${parts.month}-${parts.day}`
}

export function isResetDue(period: Period, lastReset: Date, now: Date, timeZone: string): boolean {
  switch (period) {
    case 'daily':
      // YYYY-MM-DD compares correctly as a string
      return calendarDate(now, timeZone) > calendarDate(lastReset, timeZone)
    case 'weekly':
      return now.getTime() - lastReset.getTime() >= WEEK_MS
  }
}

/**
 * Parse a stored reset timestamp. Accepts ISO 8601 and the older
 * `YYYY-MM-DD HH:MM:SS` local-time form.
 */
export function parseResetTimestamp(value: string): Date | null {
  const legacy = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/)
  const date = legacy
    ? new Date(
        Number(legacy[1]),
        Number(legacy[2]) - 1,
        Number(legacy[3]),
        Number(legacy[4]),
        Number(legacy[5]),
        Number(legacy[6])
      )
    : new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}

export class ResetScheduler {
  private readonly lastReset = new Map<Period, Date>()

  constructor(
    readonly timeZone: string,
    document: ResetDocument | null = null
  ) {
    if (!document) return
    for (const [period, stamp] of Object.entries(document)) {
      if (!isPeriod(period) || typeof stamp !== 'string') continue
      const parsed = parseResetTimestamp(stamp)
      if (parsed) this.lastReset.set(period, parsed)
    }
  }

  lastResetAt(period: Period): Date | null {
    return this.lastReset.get(period) ?? null
  }

  /** Whether `period` has a recorded reset instant */
  isTracking(period: Period): boolean {
    return this.lastReset.has(period)
  }

  /**
   * Start tracking a period without a reset (first run). Returns false when
   * the period was already tracked.
   */
  initialize(period: Period, now: Date): boolean {
    if (this.lastReset.has(period)) return false
    this.lastReset.set(period, now)
    return true
  }

  /** Side-effect free check; untracked periods are never due */
  isDue(period: Period, now: Date): boolean {
    const last = this.lastReset.get(period)
    return last !== undefined && isResetDue(period, last, now, this.timeZone)
  }

  /**
   * Advance the period's reset instant to `now` when a boundary has passed.
   * The caller snapshots baselines when this returns true.
   */
  maybeReset(now: Date, period: Period): boolean {
    if (!this.isDue(period, now)) return false
    this.lastReset.set(period, now)
    return true
  }

  toDocument(): ResetDocument {
    const doc: ResetDocument = {}
    for (const [period, instant] of this.lastReset) {
      doc[period] = instant.toISOString()
    }
    return doc
  }
}
