/**
 * Watch-time statistics
 *
 * Read-only snapshots of the ledger. A period whose reset is due at `now` is
 * reported as already rolled over (current values of zero) without touching
 * the ledger, so a report taken during an idle stretch still shows the right
 * period and two reports with nothing recorded in between are identical.
 */

import { formatDuration } from './format'
import type { WatchLedger } from './ledger'
import { limitFor } from './threshold'
import { PERIODS, TOTAL, type LimitTarget, type Period, type WatchKey } from './types'

/**
 * One value measured against its limit
 */
export interface PeriodFigure {
  seconds: number
  formatted: string
  /** Null when unlimited */
  limit: number | null
  /** Percent of limit used, 0 when unlimited */
  percent: number
  over: boolean
}

export interface KeyReport {
  key: WatchKey
  name: string
  allTimeSeconds: number
  allTimeFormatted: string
  sessions: number
  periods: Partial<Record<Period, PeriodFigure>>
}

export interface WatchReport {
  generatedAt: string
  allTime: { seconds: number; formatted: string }
  periods: Partial<Record<Period, PeriodFigure>>
  /** Sorted by all-time seconds, largest first */
  keys: KeyReport[]
  videoCount: number
}

export type NameResolver = (key: WatchKey) => string

function figure(ledger: WatchLedger, period: Period, target: LimitTarget, rolledOver: boolean): PeriodFigure {
  const seconds = rolledOver ? 0 : ledger.currentPeriodValue(target, period)
  const limit = limitFor(ledger.limits, period, target)

  return {
    seconds,
    formatted: formatDuration(seconds),
    limit,
    percent: limit === null ? 0 : (seconds / limit) * 100,
    over: limit !== null && seconds > limit,
  }
}

/**
 * Build a snapshot of the ledger as of `now`
 */
export function generateReport(ledger: WatchLedger, now: Date, nameFor: NameResolver = (key) => key): WatchReport {
  const rolledOver = new Map<Period, boolean>(ledger.periods.map((period) => [period, ledger.isResetDue(period, now)]))

  const periodFigures = (target: LimitTarget): Partial<Record<Period, PeriodFigure>> => {
    const figures: Partial<Record<Period, PeriodFigure>> = {}
    for (const period of ledger.periods) {
      figures[period] = figure(ledger, period, target, rolledOver.get(period) ?? false)
    }
    return figures
  }

  const keys = ledger
    .keyTotals()
    .sort((a, b) => b.totalSeconds - a.totalSeconds || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ key, totalSeconds, eventCount }) => ({
      key,
      name: nameFor(key),
      allTimeSeconds: totalSeconds,
      allTimeFormatted: formatDuration(totalSeconds),
      sessions: eventCount,
      periods: periodFigures({ scope: 'key', key }),
    }))

  return {
    generatedAt: now.toISOString(),
    allTime: { seconds: ledger.grandTotalSeconds, formatted: formatDuration(ledger.grandTotalSeconds) },
    periods: periodFigures(TOTAL),
    keys,
    videoCount: ledger.videoCount,
  }
}

const PERIOD_LABELS: Record<Period, string> = {
  daily: 'Today',
  weekly: 'This week',
}

function describeFigure(fig: PeriodFigure): string {
  if (fig.limit === null) return fig.formatted
  const flag = fig.over ? ' OVER' : ''
  return `${fig.formatted} / ${formatDuration(fig.limit)} (${fig.percent.toFixed(1)}%)${flag}`
}

/**
 * Render a report for the console
 */
export function formatReport(report: WatchReport, top = 5): string {
  const lines: string[] = []

  lines.push('='.repeat(60))
  lines.push(' WATCH TIME STATISTICS '.padStart(41, '=').padEnd(60, '='))
  lines.push('='.repeat(60))

  lines.push('')
  lines.push('Watch Time Summary:')
  for (const period of PERIODS) {
    const fig = report.periods[period]
    if (fig) lines.push(`  ${PERIOD_LABELS[period]}: ${describeFigure(fig)}`)
  }
  lines.push(`  All time: ${report.allTime.formatted}`)

  if (report.keys.length > 0) {
    lines.push('')
    lines.push('Top Categories:')
    for (const key of report.keys.slice(0, top)) {
      const daily = key.periods.daily
      const current = daily ? describeFigure(daily) : key.allTimeFormatted
      lines.push(`  ${key.name}: ${current} (Sessions: ${key.sessions})`)
    }
  }

  lines.push('='.repeat(60))
  return lines.join('\n')
}

/**
 * One-line summary, e.g. "Today 1h 5m / 2h 0m | This week 3h 0m | 4 videos"
 */
export function getQuickSummary(report: WatchReport): string {
  const parts: string[] = []
  for (const period of PERIODS) {
    const fig = report.periods[period]
    if (!fig) continue
    const label = PERIOD_LABELS[period]
    parts.push(fig.limit === null ? `${label} ${fig.formatted}` : `${label} ${fig.formatted} / ${formatDuration(fig.limit)}`)
  }
  parts.push(`${report.videoCount} videos`)
  return parts.join(' | ')
}
