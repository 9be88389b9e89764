import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { parseLedgerDocument, parseResetDocument } from './documents'
import { InvalidDurationError, InvalidKeyError, PersistenceError } from './errors'
import { WatchLedger, type LedgerOptions } from './ledger'
import { JsonFileStore, MemoryStore } from './store'
import { TOTAL, type LedgerDocument, type LimitConfig, type ResetDocument } from './types'

const START = new Date('2024-05-01T10:00:00Z')

const LIMITS: LimitConfig = {
  daily: { total: 7200, categories: { '20': 1800 } },
}

function setup(options: Partial<LedgerOptions> = {}, stores?: { ledger: MemoryStore<LedgerDocument>; resets: MemoryStore<ResetDocument> }) {
  const ledgerStore = stores?.ledger ?? new MemoryStore<LedgerDocument>()
  const resetStore = stores?.resets ?? new MemoryStore<ResetDocument>()
  const clock = { now: START }
  const ledger = WatchLedger.open({
    ledgerStore,
    resetStore,
    limits: LIMITS,
    timeZone: 'UTC',
    clock: () => clock.now,
    ...options,
  })
  return { ledger, ledgerStore, resetStore, clock }
}

function key(k: string) {
  return { scope: 'key', key: k } as const
}

describe('WatchLedger.open', () => {
  test('first run starts every period at now and persists it', () => {
    const { ledger, resetStore, ledgerStore } = setup()
    expect(ledger.lastResetAt('daily')).toEqual(START)
    expect(ledger.lastResetAt('weekly')).toEqual(START)
    expect(resetStore.peek()).toEqual({
      daily: '2024-05-01T10:00:00.000Z',
      weekly: '2024-05-01T10:00:00.000Z',
    })
    expect(ledgerStore.peek()).toEqual({ total_watch_time: 0, categories: {}, videos: {}, reset_points: {} })
  })

  test('a period missing from the reset document is initialised without a reset', () => {
    const resets = new MemoryStore<ResetDocument>({ daily: '2024-04-30T09:00:00.000Z' })
    const { ledger } = setup({}, { ledger: new MemoryStore<LedgerDocument>(), resets })
    expect(ledger.lastResetAt('weekly')).toEqual(START)
    expect(ledger.lastResetAt('daily')?.toISOString()).toBe('2024-04-30T09:00:00.000Z')
    expect(ledger.isResetDue('daily', START)).toBe(true)
  })

  test('restores totals and baselines from the stores', () => {
    const first = setup()
    first.ledger.record('20', 600)
    first.clock.now = new Date('2024-05-02T08:00:00Z')
    first.ledger.record('20', 300)

    const second = setup({ clock: () => new Date('2024-05-02T09:00:00Z') }, {
      ledger: first.ledgerStore,
      resets: first.resetStore,
    })
    expect(second.ledger.grandTotalSeconds).toBe(900)
    expect(second.ledger.currentPeriodValue(key('20'), 'daily')).toBe(300)
    expect(second.ledger.currentPeriodValue(key('20'), 'weekly')).toBe(900)
    expect(second.ledger.lastResetAt('daily')?.toISOString()).toBe('2024-05-02T08:00:00.000Z')
  })
})

describe('WatchLedger.record', () => {
  test('grand total is the sum of all recorded durations', () => {
    const { ledger } = setup()
    ledger.record('a', 10.5)
    ledger.record('b', 20)
    ledger.record('a', 30)

    expect(ledger.grandTotalSeconds).toBe(60.5)
    expect(ledger.keyTotals()).toEqual([
      { key: 'a', totalSeconds: 40.5, eventCount: 2 },
      { key: 'b', totalSeconds: 20, eventCount: 1 },
    ])
  })

  test('1700s then 200s on a 1800s key limit crosses only that key', () => {
    const { ledger } = setup()
    const first = ledger.record('20', 1700)
    const second = ledger.record('20', 200)

    expect(first.ok && first.crossings).toEqual([])
    expect(second.ok && second.crossings).toEqual([
      { scope: 'key', key: '20', period: 'daily', limit: 1800, before: 1700, after: 1900 },
    ])
  })

  test('reaching the limit exactly does not alert, the next second does, once', () => {
    const { ledger } = setup()
    const atLimit = ledger.record('20', 1800)
    const over = ledger.record('20', 1)
    const further = ledger.record('20', 100)

    expect(atLimit.ok && atLimit.crossings).toEqual([])
    expect(over.ok && over.crossings.length).toBe(1)
    expect(further.ok && further.crossings).toEqual([])
  })

  test('alerts again after a reset', () => {
    const { ledger, clock } = setup()
    ledger.record('20', 1801)

    clock.now = new Date('2024-05-02T07:00:00Z')
    const outcome = ledger.record('20', 1801)

    expect(outcome.ok && outcome.resets).toEqual(['daily'])
    expect(outcome.ok && outcome.crossings).toEqual([
      { scope: 'key', key: '20', period: 'daily', limit: 1800, before: 0, after: 1801 },
    ])
  })

  test('reports total before key, period by period', () => {
    const { ledger } = setup({
      limits: {
        daily: { total: 100, categories: { a: 50 } },
        weekly: { total: null, categories: { a: 100 } },
      },
    })
    const outcome = ledger.record('a', 120)

    expect(outcome.ok && outcome.crossings.map((c) => `${c.period}:${c.scope}`)).toEqual([
      'daily:total',
      'daily:key',
      'weekly:key',
    ])
  })

  test('zero duration counts a session without crossing', () => {
    const { ledger } = setup()
    ledger.record('20', 1800)
    const outcome = ledger.record('20', 0)

    expect(outcome.ok && outcome.crossings).toEqual([])
    expect(ledger.keyTotals()).toEqual([{ key: '20', totalSeconds: 1800, eventCount: 2 }])
  })

  test('rejects invalid durations without touching state', () => {
    const { ledger, ledgerStore } = setup()
    ledger.record('a', 5)
    const saves = ledgerStore.saves

    for (const bad of [-1, Number.NaN, Number.POSITIVE_INFINITY]) {
      const outcome = ledger.record('a', bad)
      expect(outcome.ok).toBe(false)
      if (!outcome.ok) expect(outcome.error).toBeInstanceOf(InvalidDurationError)
    }

    expect(ledger.grandTotalSeconds).toBe(5)
    expect(ledger.keyTotals()).toEqual([{ key: 'a', totalSeconds: 5, eventCount: 1 }])
    expect(ledgerStore.saves).toBe(saves)
  })

  test('rejects blank keys', () => {
    const { ledger } = setup()
    for (const bad of ['', '   ']) {
      const outcome = ledger.record(bad, 10)
      expect(outcome.ok).toBe(false)
      if (!outcome.ok) expect(outcome.error).toBeInstanceOf(InvalidKeyError)
    }
    expect(ledger.grandTotalSeconds).toBe(0)
  })

  test('tracks per-video totals', () => {
    const { ledger } = setup()
    ledger.record('20', 90, { videoId: 'abc' })
    ledger.record('20', 30, { videoId: 'abc' })
    ledger.record('10', 15)

    expect(ledger.videoCount).toBe(1)
    expect(ledger.toDocument()).toEqual({
      total_watch_time: 135,
      categories: {
        '20': { total_time: 120, video_count: 2 },
        '10': { total_time: 15, video_count: 1 },
      },
      videos: { abc: { total_time: 120, session_count: 2 } },
      reset_points: {},
    })
  })

  test('keeps keys that look like object internals', () => {
    const { ledger } = setup()
    ledger.record('__proto__', 10)
    ledger.record('constructor', 5)

    expect(ledger.allTimeValue(key('__proto__'))).toBe(10)
    expect(ledger.keyTotals().map((k) => k.key)).toEqual(['__proto__', 'constructor'])
  })
})

describe('resets', () => {
  test('after a daily reset the daily value is 0 and the all-time total unchanged', () => {
    const { ledger } = setup()
    ledger.record('x', 500)

    expect(ledger.applyDueResets(new Date('2024-05-02T00:00:01Z'))).toEqual(['daily'])
    expect(ledger.currentPeriodValue(key('x'), 'daily')).toBe(0)
    expect(ledger.currentPeriodValue(TOTAL, 'daily')).toBe(0)
    expect(ledger.currentPeriodValue(key('x'), 'weekly')).toBe(500)
    expect(ledger.allTimeValue(key('x'))).toBe(500)
  })

  test('two records straddling midnight: the second sees only its own duration today', () => {
    const { ledger } = setup()
    ledger.record('x', 300, { at: new Date('2024-05-01T23:59:00Z') })
    ledger.record('x', 120, { at: new Date('2024-05-02T00:01:00Z') })

    expect(ledger.currentPeriodValue(key('x'), 'daily')).toBe(120)
    expect(ledger.currentPeriodValue(key('x'), 'weekly')).toBe(420)
  })

  test('weekly resets seven days after the last one', () => {
    const { ledger } = setup()
    ledger.record('x', 100)

    expect(ledger.applyDueResets(new Date('2024-05-08T09:59:59Z'))).toEqual(['daily'])
    expect(ledger.applyDueResets(new Date('2024-05-08T10:00:00Z'))).toEqual(['weekly'])
    expect(ledger.currentPeriodValue(key('x'), 'weekly')).toBe(0)
  })

  test('baselines are written with the ledger document', () => {
    const { ledger, ledgerStore } = setup()
    ledger.record('x', 200)
    ledger.record('y', 50, { at: new Date('2024-05-02T12:00:00Z') })

    expect(ledgerStore.peek()?.reset_points).toEqual({
      daily: { total_time: 200, categories: { x: 200 } },
    })
  })

  test('a reset instant in the future never fires', () => {
    const resets = new MemoryStore<ResetDocument>({
      daily: '2024-06-01T00:00:00.000Z',
      weekly: '2024-06-01T00:00:00.000Z',
    })
    const { ledger } = setup({}, { ledger: new MemoryStore<LedgerDocument>(), resets })
    const outcome = ledger.record('x', 10)

    expect(outcome.ok && outcome.resets).toEqual([])
    expect(ledger.lastResetAt('daily')?.toISOString()).toBe('2024-06-01T00:00:00.000Z')
  })
})

describe('persistence failures', () => {
  test('keep the update in memory and report the error', () => {
    const { ledger, ledgerStore } = setup()
    ledgerStore.failWrites = true

    const outcome = ledger.record('20', 60)
    expect(outcome.ok).toBe(true)
    if (outcome.ok) expect(outcome.persistError).toBeInstanceOf(PersistenceError)
    expect(ledger.grandTotalSeconds).toBe(60)
    expect(ledger.hasPendingWrites).toBe(true)

    ledgerStore.failWrites = false
    expect(ledger.flush()).toBeNull()
    expect(ledgerStore.peek()?.total_watch_time).toBe(60)
    expect(ledger.hasPendingWrites).toBe(false)
  })

  test('the next successful write carries every pending update', () => {
    const { ledger, ledgerStore } = setup()
    ledgerStore.failWrites = true
    ledger.record('a', 10)
    ledger.record('b', 20)
    ledgerStore.failWrites = false

    const outcome = ledger.record('a', 5)
    expect(outcome.ok && outcome.persistError).toBeNull()
    expect(ledgerStore.peek()?.categories).toEqual({
      a: { total_time: 15, video_count: 2 },
      b: { total_time: 20, video_count: 1 },
    })
  })

  test('the reset document is not written when the ledger write fails', () => {
    const { ledger, ledgerStore, resetStore, clock } = setup()
    ledgerStore.failWrites = true
    clock.now = new Date('2024-05-02T08:00:00Z')
    ledger.record('x', 10)

    expect(resetStore.peek()?.daily).toBe('2024-05-01T10:00:00.000Z')
  })
})

describe('on disk', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'watch-ledger-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function openOnDisk(now: Date) {
    return WatchLedger.open({
      ledgerStore: new JsonFileStore(join(dir, 'watch_time.json'), parseLedgerDocument),
      resetStore: new JsonFileStore(join(dir, 'last_reset.json'), parseResetDocument),
      limits: LIMITS,
      timeZone: 'UTC',
      clock: () => now,
    })
  }

  test('writes both documents and reloads them', () => {
    const ledger = openOnDisk(START)
    ledger.record('20', 1700, { videoId: 'vid1' })

    expect(readdirSync(dir).sort()).toEqual(['last_reset.json', 'watch_time.json'])
    expect(JSON.parse(readFileSync(join(dir, 'last_reset.json'), 'utf-8'))).toEqual({
      daily: '2024-05-01T10:00:00.000Z',
      weekly: '2024-05-01T10:00:00.000Z',
    })

    const reopened = openOnDisk(new Date('2024-05-01T11:00:00Z'))
    expect(reopened.grandTotalSeconds).toBe(1700)
    const outcome = reopened.record('20', 200)
    expect(outcome.ok && outcome.crossings.length).toBe(1)
  })

  test('an unparseable ledger is set aside and replaced', () => {
    openOnDisk(START).record('a', 5)
    const path = join(dir, 'watch_time.json')
    writeFileSync(path, '{ not json')

    const ledger = openOnDisk(START)
    expect(ledger.grandTotalSeconds).toBe(0)
    expect(existsSync(path)).toBe(false)

    const aside = readdirSync(dir).filter((name) => name.startsWith('watch_time.json.corrupt-'))
    expect(aside).toHaveLength(1)
    expect(readFileSync(join(dir, aside[0]), 'utf-8')).toBe('{ not json')
  })
})
