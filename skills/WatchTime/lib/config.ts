/**
 * config.ts - Monitor settings from Config/watch-monitor.yaml
 *
 * Environment variables (process.env first, then the .env file) override the
 * file: TV_IP, POLLING_INTERVAL, WATCH_DATA_DIR. API keys only come from the
 * environment. Anything malformed throws ConfigError naming the field.
 */

import { existsSync, readFileSync } from 'fs'
import { dirname, join } from 'path'
import { parse as parseYaml } from 'yaml'
import { isRecord } from '../Ledger/documents'
import { ConfigError } from '../Ledger/errors'
import { PERIODS, isPeriod, type Period } from '../Ledger/types'
import type { EnvLookup } from './env'
import { errorMessage } from './log'
import { DEFAULT_DATA_DIR, resolvePath } from './paths'

export type KeyScheme = 'category' | 'theme'

export interface MonitorConfig {
  tv: {
    /** Null until TV_IP or tv.host is set */
    host: string | null
    port: number
    pollingIntervalSeconds: number
    youtubeAppId: string
  }
  tracking: {
    keyScheme: KeyScheme
    /** IANA zone for daily resets, null for the system zone */
    timeZone: string | null
    periods: Period[]
  }
  dataDir: string
  voice: {
    url: string
    enabled: boolean
  }
  limitsFile: string
  youtubeApiKey: string | null
  openaiApiKey: string | null
}

export const DEFAULT_PORT = 8001
export const DEFAULT_POLLING_INTERVAL = 5
export const YOUTUBE_APP_ID = '111299001912'
export const DEFAULT_VOICE_URL = 'http://localhost:8888'

class Section {
  constructor(
    private readonly source: string,
    private readonly name: string,
    private readonly values: Record<string, unknown>
  ) {}

  static of(source: string, raw: Record<string, unknown>, name: string): Section {
    const value = raw[name]
    if (value === undefined || value === null) return new Section(source, name, {})
    if (!isRecord(value)) throw new ConfigError(source, `${name} must be a mapping`)
    return new Section(source, name, value)
  }

  string(field: string): string | undefined {
    const value = this.values[field]
    if (value === undefined || value === null) return undefined
    if (typeof value === 'number') return String(value)
    if (typeof value !== 'string') throw this.invalid(field, 'a string')
    return value
  }

  number(field: string): number | undefined {
    const value = this.values[field]
    if (value === undefined || value === null) return undefined
    if (typeof value !== 'number' || !Number.isFinite(value)) throw this.invalid(field, 'a number')
    return value
  }

  boolean(field: string): boolean | undefined {
    const value = this.values[field]
    if (value === undefined || value === null) return undefined
    if (typeof value !== 'boolean') throw this.invalid(field, 'true or false')
    return value
  }

  list(field: string): unknown[] | undefined {
    const value = this.values[field]
    if (value === undefined || value === null) return undefined
    if (!Array.isArray(value)) throw this.invalid(field, 'a list')
    return value
  }

  invalid(field: string, expected: string): ConfigError {
    return new ConfigError(this.source, `${this.name}.${field} must be ${expected}`)
  }
}

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone })
    return true
  } catch {
    return false
  }
}

function positive(value: number, field: string, source: string): number {
  if (value <= 0) throw new ConfigError(source, `${field} must be greater than 0`)
  return value
}

/**
 * Validate a parsed settings document. Relative paths resolve against
 * `baseDir`, the directory of the settings file.
 */
export function parseMonitorConfig(raw: unknown, source: string, env: EnvLookup, baseDir: string): MonitorConfig {
  const doc = raw === null || raw === undefined ? {} : raw
  if (!isRecord(doc)) throw new ConfigError(source, 'expected a mapping')

  const tv = Section.of(source, doc, 'tv')
  const tracking = Section.of(source, doc, 'tracking')
  const storage = Section.of(source, doc, 'storage')
  const voice = Section.of(source, doc, 'voice')

  const port = tv.number('port') ?? DEFAULT_PORT
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw tv.invalid('port', 'an integer between 1 and 65535')
  }

  let pollingIntervalSeconds = tv.number('polling_interval_seconds') ?? DEFAULT_POLLING_INTERVAL
  const pollingOverride = env('POLLING_INTERVAL')
  if (pollingOverride !== undefined) {
    pollingIntervalSeconds = Number(pollingOverride)
    if (!Number.isFinite(pollingIntervalSeconds)) {
      throw new ConfigError(source, `POLLING_INTERVAL must be a number, got "${pollingOverride}"`)
    }
  }
  positive(pollingIntervalSeconds, 'polling interval', source)

  const scheme = tracking.string('key_scheme') ?? 'category'
  if (scheme !== 'category' && scheme !== 'theme') {
    throw tracking.invalid('key_scheme', `"category" or "theme", got "${scheme}"`)
  }

  const timeZone = tracking.string('time_zone') ?? null
  if (timeZone !== null && !isTimeZone(timeZone)) {
    throw tracking.invalid('time_zone', `an IANA time zone, got "${timeZone}"`)
  }

  const periods: Period[] = []
  for (const value of tracking.list('periods') ?? PERIODS) {
    if (!isPeriod(value)) throw tracking.invalid('periods', `a list of ${PERIODS.join(', ')}`)
    if (!periods.includes(value)) periods.push(value)
  }
  if (periods.length === 0) throw tracking.invalid('periods', 'a non-empty list')

  const limitsFile = doc.limits_file ?? 'limits.yaml'
  if (typeof limitsFile !== 'string') throw new ConfigError(source, 'limits_file must be a path')

  return {
    tv: {
      host: env('TV_IP') ?? tv.string('host') ?? null,
      port,
      pollingIntervalSeconds,
      youtubeAppId: tv.string('youtube_app_id') ?? YOUTUBE_APP_ID,
    },
    tracking: { keyScheme: scheme, timeZone, periods },
    dataDir: resolvePath(env('WATCH_DATA_DIR') ?? storage.string('data_dir') ?? DEFAULT_DATA_DIR, baseDir),
    voice: {
      url: (voice.string('url') ?? DEFAULT_VOICE_URL).replace(/\/+$/, ''),
      enabled: voice.boolean('enabled') ?? true,
    },
    limitsFile: resolvePath(limitsFile, baseDir),
    youtubeApiKey: env('YOUTUBE_API_KEY') ?? null,
    openaiApiKey: env('OPENAI_API_KEY') ?? null,
  }
}

export function loadMonitorConfig(path: string, env: EnvLookup): MonitorConfig {
  if (!existsSync(path)) {
    throw new ConfigError(path, 'settings file not found')
  }

  let raw: unknown
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(path, errorMessage(err), { cause: err })
  }

  return parseMonitorConfig(raw, path, env, dirname(path))
}

/** Files the monitor keeps in its data dir */
export function dataFiles(config: MonitorConfig) {
  return {
    ledger: join(config.dataDir, 'watch_time.json'),
    resets: join(config.dataDir, 'last_reset.json'),
    videos: join(config.dataDir, 'youtube_videos.json'),
    themes: join(config.dataDir, 'theme_cache.json'),
    log: join(config.dataDir, 'monitor.log'),
    detections: join(config.dataDir, 'detected_videos.log'),
  }
}
