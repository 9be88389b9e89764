/**
 * Watch-Time Ledger
 *
 * Authoritative in-memory counters of watched seconds per key plus a grand
 * total, with one reset baseline per period. The current-period value of a
 * key (or of the total) is its all-time figure minus the baseline captured at
 * the period's last reset; resets never touch the all-time figures.
 *
 * Every mutation is written through to two documents: the ledger first, then
 * the reset timestamps. A crash between the two leaves the old reset instant
 * on disk, so the reset fires again on restart instead of being lost.
 */

import { createLogger } from '../lib/log'
import { InvalidDurationError, InvalidKeyError, PersistenceError } from './errors'
import { localTimeZone, ResetScheduler } from './schedule'
import type { DocumentStore } from './store'
import { evaluateCrossing } from './threshold'
import {
  PERIODS,
  TOTAL,
  type Crossing,
  type KeyTotalsDocument,
  type LedgerDocument,
  type LimitConfig,
  type LimitTarget,
  type Period,
  type ResetDocument,
  type VideoTotalsDocument,
  type WatchKey,
} from './types'

const log = createLogger('ledger')

export interface LedgerOptions {
  ledgerStore: DocumentStore<LedgerDocument>
  resetStore: DocumentStore<ResetDocument>
  limits: LimitConfig
  /** Periods to keep baselines for, default daily and weekly */
  periods?: readonly Period[]
  /** IANA zone daily boundaries are computed in, default the process zone */
  timeZone?: string
  clock?: () => Date
}

export interface RecordOptions {
  /** When the session ended, default the ledger clock */
  at?: Date
  /** Video the session belongs to, for per-video totals */
  videoId?: string
}

export type RecordOutcome =
  | {
      ok: true
      crossings: Crossing[]
      /** Periods that rolled over before this update was applied */
      resets: Period[]
      /** Set when the update is held in memory only */
      persistError: PersistenceError | null
    }
  | { ok: false; error: InvalidDurationError | InvalidKeyError }

export interface KeyTotals {
  key: WatchKey
  totalSeconds: number
  eventCount: number
}

interface Entry {
  totalSeconds: number
  eventCount: number
}

interface VideoEntry {
  totalSeconds: number
  sessionCount: number
}

interface Baseline {
  grandTotal: number
  keys: Map<WatchKey, number>
}

export class WatchLedger {
  readonly periods: readonly Period[]
  readonly limits: LimitConfig

  private readonly ledgerStore: DocumentStore<LedgerDocument>
  private readonly resetStore: DocumentStore<ResetDocument>
  private readonly scheduler: ResetScheduler
  private readonly clock: () => Date

  private grandTotal = 0
  private readonly entries = new Map<WatchKey, Entry>()
  private readonly videos = new Map<string, VideoEntry>()
  private readonly baselines = new Map<Period, Baseline>()
  private dirty = false

  private constructor(options: LedgerOptions, ledgerDoc: LedgerDocument | null, resetDoc: ResetDocument | null) {
    this.periods = options.periods ?? PERIODS
    this.limits = options.limits
    this.ledgerStore = options.ledgerStore
    this.resetStore = options.resetStore
    this.clock = options.clock ?? (() => new Date())
    this.scheduler = new ResetScheduler(options.timeZone ?? localTimeZone(), resetDoc)

    if (ledgerDoc) this.loadDocument(ledgerDoc)
  }

  /**
   * Load both documents and start tracking any period seen for the first
   * time. Throws PersistenceError when a document exists but cannot be read.
   */
  static open(options: LedgerOptions): WatchLedger {
    const ledger = new WatchLedger(options, options.ledgerStore.load(), options.resetStore.load())

    const now = ledger.clock()
    for (const period of ledger.periods) {
      if (ledger.scheduler.initialize(period, now)) {
        log.info(`Tracking ${period} period from ${now.toISOString()}`)
        ledger.dirty = true
      }
    }
    ledger.flush()

    return ledger
  }

  get timeZone(): string {
    return this.scheduler.timeZone
  }

  get grandTotalSeconds(): number {
    return this.grandTotal
  }

  get videoCount(): number {
    return this.videos.size
  }

  get ledgerLocation(): string {
    return this.ledgerStore.location
  }

  get resetLocation(): string {
    return this.resetStore.location
  }

  /** True while some mutation has not reached disk */
  get hasPendingWrites(): boolean {
    return this.dirty
  }

  /**
   * Add one completed session of `durationSeconds` under `key` and report
   * the limits this update crossed.
   */
  record(key: WatchKey, durationSeconds: number, options: RecordOptions = {}): RecordOutcome {
    if (typeof key !== 'string' || key.trim() === '') {
      return { ok: false, error: new InvalidKeyError(key) }
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      return { ok: false, error: new InvalidDurationError(durationSeconds) }
    }

    const at = options.at ?? this.clock()
    const resets = this.applyDueResets(at)

    const target: LimitTarget = { scope: 'key', key }
    const before = this.periods.map((period) => ({
      period,
      total: this.currentPeriodValue(TOTAL, period),
      key: this.currentPeriodValue(target, period),
    }))

    const entry = this.entries.get(key) ?? { totalSeconds: 0, eventCount: 0 }
    entry.totalSeconds += durationSeconds
    entry.eventCount += 1
    this.entries.set(key, entry)
    this.grandTotal += durationSeconds

    if (options.videoId) {
      const video = this.videos.get(options.videoId) ?? { totalSeconds: 0, sessionCount: 0 }
      video.totalSeconds += durationSeconds
      video.sessionCount += 1
      this.videos.set(options.videoId, video)
    }

    this.dirty = true
    const persistError = this.flush()

    const crossings: Crossing[] = []
    for (const { period, total, key: keyBefore } of before) {
      const totalCrossing = evaluateCrossing(this.limits, period, TOTAL, total, this.currentPeriodValue(TOTAL, period))
      if (totalCrossing) crossings.push(totalCrossing)

      const keyCrossing = evaluateCrossing(this.limits, period, target, keyBefore, this.currentPeriodValue(target, period))
      if (keyCrossing) crossings.push(keyCrossing)
    }

    return { ok: true, crossings, resets, persistError }
  }

  /**
   * Roll over every period whose boundary has passed by `now`, capturing the
   * current totals as that period's baseline. Does not persist; `record`
   * and `flush` do.
   */
  applyDueResets(now: Date): Period[] {
    const resets: Period[] = []

    for (const period of this.periods) {
      if (this.scheduler.initialize(period, now)) {
        this.dirty = true
        continue
      }
      if (!this.scheduler.maybeReset(now, period)) continue

      const keys = new Map<WatchKey, number>()
      for (const [key, entry] of this.entries) {
        keys.set(key, entry.totalSeconds)
      }
      this.baselines.set(period, { grandTotal: this.grandTotal, keys })
      this.dirty = true
      resets.push(period)
      log.info(`Performing ${period} watch time reset`)
    }

    return resets
  }

  /**
   * Write pending state. Returns the error instead of throwing so callers can
   * keep going on the in-memory state; the next flush retries everything.
   */
  flush(): PersistenceError | null {
    if (!this.dirty) return null

    try {
      this.ledgerStore.save(this.toDocument())
      this.resetStore.save(this.scheduler.toDocument())
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err
      log.error(`${err.message} (keeping ${this.entries.size} keys in memory)`)
      return err
    }

    this.dirty = false
    return null
  }

  currentPeriodValue(target: LimitTarget, period: Period): number {
    return this.allTimeValue(target) - this.baselineFor(period, target)
  }

  allTimeValue(target: LimitTarget): number {
    if (target.scope === 'total') return this.grandTotal
    return this.entries.get(target.key)?.totalSeconds ?? 0
  }

  baselineFor(period: Period, target: LimitTarget): number {
    const baseline = this.baselines.get(period)
    if (!baseline) return 0
    if (target.scope === 'total') return baseline.grandTotal
    return baseline.keys.get(target.key) ?? 0
  }

  /** Whether `period` would roll over if something were recorded at `now` */
  isResetDue(period: Period, now: Date): boolean {
    return this.scheduler.isDue(period, now)
  }

  lastResetAt(period: Period): Date | null {
    return this.scheduler.lastResetAt(period)
  }

  keyTotals(): KeyTotals[] {
    return [...this.entries].map(([key, entry]) => ({
      key,
      totalSeconds: entry.totalSeconds,
      eventCount: entry.eventCount,
    }))
  }

  toDocument(): LedgerDocument {
    const resetPoints: LedgerDocument['reset_points'] = {}
    for (const [period, baseline] of this.baselines) {
      resetPoints[period] = {
        total_time: baseline.grandTotal,
        categories: Object.fromEntries(baseline.keys),
      }
    }

    return {
      total_watch_time: this.grandTotal,
      categories: Object.fromEntries(
        [...this.entries].map(([key, entry]): [WatchKey, KeyTotalsDocument] => [key, { total_time: entry.totalSeconds, video_count: entry.eventCount }])
      ),
      videos: Object.fromEntries(
        [...this.videos].map(([id, video]): [string, VideoTotalsDocument] => [id, { total_time: video.totalSeconds, session_count: video.sessionCount }])
      ),
      reset_points: resetPoints,
    }
  }

  private loadDocument(doc: LedgerDocument): void {
    this.grandTotal = doc.total_watch_time

    for (const [key, entry] of Object.entries(doc.categories)) {
      this.entries.set(key, { totalSeconds: entry.total_time, eventCount: entry.video_count })
    }
    for (const [id, video] of Object.entries(doc.videos)) {
      this.videos.set(id, { totalSeconds: video.total_time, sessionCount: video.session_count })
    }
    for (const period of PERIODS) {
      const point = doc.reset_points[period]
      if (!point) continue
      this.baselines.set(period, {
        grandTotal: point.total_time,
        keys: new Map(Object.entries(point.categories)),
      })
    }
  }
}
