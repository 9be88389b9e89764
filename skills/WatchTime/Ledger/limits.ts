/**
 * Limits configuration
 *
 *   daily:
 *     total: 7200
 *     categories:
 *       "20": 1800
 *   weekly:
 *     total: 28800
 *
 * Values are seconds. A limit of 0 means unlimited and is dropped. The file is
 * YAML; JSON limits files parse unchanged.
 */

import { existsSync, readFileSync } from 'fs'
import { parse as parseYaml } from 'yaml'
import { isRecord } from './documents'
import { errorMessage } from '../lib/log'
import { ConfigError } from './errors'
import { isPeriod, type LimitConfig, type PeriodLimits } from './types'

function limitValue(value: unknown, field: string, source: string): number | null {
  if (value === undefined || value === null) return null
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(source, `${field} must be a non-negative number of seconds`)
  }
  return value === 0 ? null : value
}

export function parseLimits(raw: unknown, source: string): LimitConfig {
  if (raw === null || raw === undefined) return {}
  if (!isRecord(raw)) throw new ConfigError(source, 'expected a mapping of periods')

  const limits: LimitConfig = {}

  for (const [period, value] of Object.entries(raw)) {
    if (!isPeriod(period)) {
      throw new ConfigError(source, `unknown period "${period}" (expected daily or weekly)`)
    }
    if (value === null || value === undefined) continue
    if (!isRecord(value)) throw new ConfigError(source, `${period} must be a mapping`)

    const periodLimits: PeriodLimits = {
      total: limitValue(value.total, `${period}.total`, source),
      categories: {},
    }

    const categories = value.categories ?? {}
    if (!isRecord(categories)) throw new ConfigError(source, `${period}.categories must be a mapping`)
    for (const [key, seconds] of Object.entries(categories)) {
      const limit = limitValue(seconds, `${period}.categories.${key}`, source)
      if (limit !== null) periodLimits.categories[key] = limit
    }

    limits[period] = periodLimits
  }

  return limits
}

/**
 * Load limits once at startup. Missing or malformed files throw ConfigError.
 */
export function loadLimits(path: string): LimitConfig {
  if (!existsSync(path)) {
    throw new ConfigError(path, 'limits file not found')
  }

  let raw: unknown
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(path, errorMessage(err), { cause: err })
  }

  return parseLimits(raw, path)
}
