/**
 * Shape checks for documents read back from disk
 *
 * Parsers throw on anything that is not the expected shape; the store treats
 * that the same as unparseable JSON.
 */

import {
  PERIODS,
  type KeyTotalsDocument,
  type LedgerDocument,
  type ResetDocument,
  type ResetPointDocument,
  type VideoTotalsDocument,
} from './types'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function seconds(value: unknown, field: string): number {
  if (value === undefined || value === null) return 0
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${field} must be a number`)
  }
  return value
}

function count(value: unknown, field: string): number {
  const n = seconds(value, field)
  return Math.max(0, Math.floor(n))
}

function record(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) throw new Error(`${field} must be an object`)
  return value
}

function resetPoint(value: unknown, field: string): ResetPointDocument {
  const point = record(value, field)
  const categories = Object.fromEntries(
    Object.entries(record(point.categories, `${field}.categories`)).map(([key, total]): [string, number] => [
      key,
      seconds(total, `${field}.categories.${key}`),
    ])
  )
  return { total_time: seconds(point.total_time, `${field}.total_time`), categories }
}

export function emptyLedgerDocument(): LedgerDocument {
  return { total_watch_time: 0, categories: {}, videos: {}, reset_points: {} }
}

export function parseLedgerDocument(raw: unknown): LedgerDocument {
  const doc = record(raw, 'ledger')
  const parsed = emptyLedgerDocument()

  parsed.total_watch_time = seconds(doc.total_watch_time, 'total_watch_time')

  // fromEntries defines own properties, so a "__proto__" key survives
  parsed.categories = Object.fromEntries(
    Object.entries(record(doc.categories, 'categories')).map(([key, value]): [string, KeyTotalsDocument] => {
      const entry = record(value, `categories.${key}`)
      return [
        key,
        {
          total_time: seconds(entry.total_time, `categories.${key}.total_time`),
          video_count: count(entry.video_count, `categories.${key}.video_count`),
        },
      ]
    })
  )

  parsed.videos = Object.fromEntries(
    Object.entries(record(doc.videos, 'videos')).map(([id, value]): [string, VideoTotalsDocument] => {
      const entry = record(value, `videos.${id}`)
      return [
        id,
        {
          total_time: seconds(entry.total_time, `videos.${id}.total_time`),
          session_count: count(entry.session_count, `videos.${id}.session_count`),
        },
      ]
    })
  )

  const points = record(doc.reset_points, 'reset_points')
  for (const period of PERIODS) {
    if (points[period] !== undefined) {
      parsed.reset_points[period] = resetPoint(points[period], `reset_points.${period}`)
    }
  }

  return parsed
}

export function parseResetDocument(raw: unknown): ResetDocument {
  const doc = record(raw, 'reset timestamps')
  const parsed: ResetDocument = {}
  for (const period of PERIODS) {
    const stamp = doc[period]
    if (stamp === undefined) continue
    if (typeof stamp !== 'string') throw new Error(`${period} must be a timestamp string`)
    parsed[period] = stamp
  }
  return parsed
}
