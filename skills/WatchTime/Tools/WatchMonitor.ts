#!/usr/bin/env -S npx tsx
/**
 * WatchMonitor - YouTube watch time monitor for a Samsung TV
 *
 * Usage:
 *   tsx WatchMonitor.ts watch                    # Poll the TV and track watch time
 *   tsx WatchMonitor.ts stats [--json]           # Watch time statistics
 *   tsx WatchMonitor.ts record <key> <seconds>   # Add a session by hand
 *   tsx WatchMonitor.ts health                   # Ledger, reset and limits status
 *   tsx WatchMonitor.ts test                     # TV, YouTube API and voice server connectivity
 *
 * Environment:
 *   TV_IP, YOUTUBE_API_KEY, OPENAI_API_KEY, POLLING_INTERVAL, WATCH_DATA_DIR
 *   WATCH_CONFIG    settings file (default Config/watch-monitor.yaml)
 *   WATCH_ENV_FILE  .env file (default ~/.config/watch-monitor/.env)
 *   WATCH_DEBUG     log DEBUG lines
 */

import { existsSync } from 'fs'
import {
  ConfigError,
  JsonFileStore,
  MemoryStore,
  WatchLedger,
  combineAlerts,
  describeCrossing,
  formatDuration,
  formatReport,
  generateReport,
  getQuickSummary,
  loadLimits,
  parseLedgerDocument,
  parseResetDocument,
  type NameResolver,
} from '../Ledger'
import { categoryName, loadCategoryNames } from '../lib/categories'
import { dataFiles, loadMonitorConfig, type MonitorConfig } from '../lib/config'
import { envLookup, loadEnv } from '../lib/env'
import { configureLogging, createLogger, errorMessage } from '../lib/log'
import { DEFAULT_CONFIG_PATH, DEFAULT_ENV_PATH } from '../lib/paths'
import { Monitor, type MonitorStats } from './Monitor'
import { ThemeClassifier, parseThemeCache } from './ThemeClassifier'
import { TvConnection } from './TvConnection'
import { VideoCatalog, parseVideoCache, type VideoCache } from './VideoCatalog'
import { VoiceAlert } from './VoiceAlert'

const log = createLogger('cli')

// A short public video used for the API connectivity check
const TEST_VIDEO_ID = 'jNQXAC9IVRw'

interface Runtime {
  config: MonitorConfig
  ledger: WatchLedger
  nameFor: NameResolver
}

function banner(title: string): string {
  const padded = ` ${title} `
  return padded.padStart(Math.floor((60 + padded.length) / 2), '=').padEnd(60, '=')
}

function loadConfig(): MonitorConfig {
  const env = envLookup(loadEnv(process.env.WATCH_ENV_FILE ?? DEFAULT_ENV_PATH))
  const config = loadMonitorConfig(process.env.WATCH_CONFIG ?? DEFAULT_CONFIG_PATH, env)
  configureLogging({ file: dataFiles(config).log })
  return config
}

function bootstrap(): Runtime {
  const config = loadConfig()
  const files = dataFiles(config)

  const ledger = WatchLedger.open({
    ledgerStore: new JsonFileStore(files.ledger, parseLedgerDocument),
    resetStore: new JsonFileStore(files.resets, parseResetDocument),
    limits: loadLimits(config.limitsFile),
    periods: config.tracking.periods,
    timeZone: config.tracking.timeZone ?? undefined,
  })

  let nameFor: NameResolver = (key) => key
  if (config.tracking.keyScheme === 'category') {
    const names = loadCategoryNames()
    nameFor = (key) => categoryName(names, key)
  }

  return { config, ledger, nameFor }
}

function printSessionStats(stats: MonitorStats, now: Date): void {
  console.log('')
  console.log('='.repeat(60))
  console.log(banner('YOUTUBE MONITOR SESSION STATISTICS'))
  console.log('='.repeat(60))
  console.log(`Session duration: ${formatDuration((now.getTime() - stats.startedAt.getTime()) / 1000)}`)
  console.log(`Videos detected: ${stats.videosDetected}`)
  console.log(`Sessions recorded: ${stats.sessionsRecorded}`)
  console.log(`Time limit alerts: ${stats.alertsTriggered}`)
}

async function watch(): Promise<void> {
  const { config, ledger, nameFor } = bootstrap()
  const files = dataFiles(config)

  if (!config.tv.host) {
    throw new ConfigError(process.env.WATCH_CONFIG ?? DEFAULT_CONFIG_PATH, 'tv.host (or TV_IP) is required')
  }
  if (!config.youtubeApiKey) {
    throw new ConfigError('environment', 'YOUTUBE_API_KEY is not set')
  }
  if (config.tracking.keyScheme === 'theme' && !config.openaiApiKey) {
    throw new ConfigError('environment', 'OPENAI_API_KEY is required for the theme key scheme')
  }

  const themes =
    config.tracking.keyScheme === 'theme' && config.openaiApiKey
      ? new ThemeClassifier({
          apiKey: config.openaiApiKey,
          cache: new JsonFileStore(files.themes, parseThemeCache),
        })
      : null

  const monitor = new Monitor({
    ledger,
    tv: new TvConnection({ host: config.tv.host, port: config.tv.port, youtubeAppId: config.tv.youtubeAppId }),
    videos: new VideoCatalog({
      apiKey: config.youtubeApiKey,
      cache: new JsonFileStore(files.videos, parseVideoCache),
    }),
    themes,
    alerts: new VoiceAlert({ url: config.voice.url, enabled: config.voice.enabled }),
    keyScheme: config.tracking.keyScheme,
    nameFor,
    pollIntervalMs: config.tv.pollingIntervalSeconds * 1000,
    detectionLog: files.detections,
  })

  const stop = (signal: string) => {
    log.info(`Received ${signal}, stopping`)
    monitor.stop()
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))

  console.log('\n' + '='.repeat(60))
  console.log(banner('SAMSUNG TV YOUTUBE MONITOR'))
  console.log('='.repeat(60))
  console.log(`\nMonitoring ${config.tv.host} for YouTube videos (keys: ${config.tracking.keyScheme})`)
  console.log('Press Ctrl+C to stop monitoring and view statistics\n')

  const stats = await monitor.run()
  const now = new Date()
  printSessionStats(stats, now)
  console.log(formatReport(generateReport(ledger, now, nameFor)))
}

function stats(args: string[]): void {
  const { ledger, nameFor } = bootstrap()
  const report = generateReport(ledger, new Date(), nameFor)

  if (args.includes('--json')) {
    console.log(JSON.stringify(report, null, 2))
    return
  }
  console.log(formatReport(report))
  console.log(getQuickSummary(report))
}

function record(args: string[]): void {
  const [key, rawSeconds] = args
  if (!key || rawSeconds === undefined) {
    console.error('Usage: WatchMonitor.ts record <key> <seconds>')
    process.exitCode = 1
    return
  }

  const seconds = rawSeconds.trim() === '' ? Number.NaN : Number(rawSeconds)
  const { ledger, nameFor } = bootstrap()
  const outcome = ledger.record(key, seconds)
  if (!outcome.ok) {
    console.error(`❌ ${outcome.error.message}`)
    process.exitCode = 1
    return
  }

  console.log(`✓ Recorded ${formatDuration(seconds)} of ${nameFor(key)} (${key})`)
  for (const period of outcome.resets) {
    console.log(`  ${period} period rolled over first`)
  }

  const message = combineAlerts(outcome.crossings.map((crossing) => describeCrossing(crossing, nameFor)))
  if (message) console.log(`⚠️  ${message}`)

  if (outcome.persistError) {
    console.error(`❌ ${outcome.persistError.message}`)
    process.exitCode = 1
  }
}

function health(): void {
  const { config, ledger } = bootstrap()
  const now = new Date()

  console.log('Watch Monitor Health Status')
  console.log('='.repeat(40))
  console.log(`Ledger: ${ledger.ledgerLocation} ${existsSync(ledger.ledgerLocation) ? '✓' : '✗ missing'}`)
  console.log(`Resets: ${ledger.resetLocation} ${existsSync(ledger.resetLocation) ? '✓' : '✗ missing'}`)
  console.log(`Limits: ${config.limitsFile}`)
  console.log(`Key scheme: ${config.tracking.keyScheme}`)
  console.log(`Time zone: ${ledger.timeZone}`)

  for (const period of ledger.periods) {
    const last = ledger.lastResetAt(period)
    const due = ledger.isResetDue(period, now) ? ' (reset due)' : ''
    console.log(`Last ${period} reset: ${last ? last.toISOString() : 'Never'}${due}`)
  }

  console.log(`Tracked keys: ${ledger.keyTotals().length}`)
  console.log(`All time: ${formatDuration(ledger.grandTotalSeconds)}`)
  console.log(`Status: ${ledger.hasPendingWrites ? '⚠️  UNSAVED CHANGES' : '✓ HEALTHY'}`)
}

async function test(): Promise<void> {
  const config = loadConfig()
  console.log('Testing watch monitor connectivity...\n')

  console.log('1. Samsung TV...')
  if (!config.tv.host) {
    console.log('   ✗ TV_IP not set')
  } else {
    const tv = new TvConnection({ host: config.tv.host, port: config.tv.port, youtubeAppId: config.tv.youtubeAppId })
    const info = await tv.deviceInfo()
    console.log(info ? `   ✓ OK (${info.name} - ${info.model})` : `   ✗ NOT REACHABLE at ${config.tv.host}:${config.tv.port}`)
  }

  console.log('2. YouTube Data API...')
  if (!config.youtubeApiKey) {
    console.log('   ✗ YOUTUBE_API_KEY not set')
  } else {
    const catalog = new VideoCatalog({ apiKey: config.youtubeApiKey, cache: new MemoryStore<VideoCache>() })
    const video = await catalog.lookup(TEST_VIDEO_ID)
    console.log(video ? `   ✓ OK ("${video.title}")` : '   ✗ FAILED')
  }

  console.log('3. OpenAI...')
  console.log(config.openaiApiKey ? '   ✓ key configured' : '   ⚠️  OPENAI_API_KEY not set (only needed for themes)')

  console.log('4. Voice Server...')
  const voice = new VoiceAlert({ url: config.voice.url })
  console.log((await voice.health()) ? '   ✓ OK' : '   ⚠️  NOT RUNNING (optional)')

  console.log('\n5. Configuration files...')
  console.log(`   ${existsSync(config.limitsFile) ? '✓' : '✗'} ${config.limitsFile}`)
}

export async function main(args: string[]): Promise<void> {
  const [command = 'help', ...rest] = args

  switch (command) {
    case 'watch':
      await watch()
      break
    case 'stats':
      stats(rest)
      break
    case 'record':
      record(rest)
      break
    case 'health':
      health()
      break
    case 'test':
      await test()
      break
    default:
      console.log(`
YouTube Watch Time Monitor

Usage:
  tsx WatchMonitor.ts watch                    Poll the TV and track watch time
  tsx WatchMonitor.ts stats [--json]           Watch time statistics
  tsx WatchMonitor.ts record <key> <seconds>   Add a session by hand
  tsx WatchMonitor.ts health                   Ledger, reset and limits status
  tsx WatchMonitor.ts test                     Test TV, YouTube API and voice server
`)
  }
}

const isMainModule = process.argv[1]?.endsWith('WatchMonitor.ts') ?? false

if (isMainModule) {
  main(process.argv.slice(2)).catch((err) => {
    console.error(`❌ ${errorMessage(err)}`)
    process.exit(1)
  })
}
