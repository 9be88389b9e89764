/**
 * Monitor - Polling loop that turns TV state into watch sessions
 *
 * Each tick asks the TV which video is on screen. A different id closes the
 * open session and opens a new one; no id closes the open session. Closing a
 * session derives its watch key (category id or theme), records it in the
 * ledger and speaks any limits the update crossed.
 *
 * Sessions are also written to the video catalog's watch history, and each
 * new id is appended to the detection log.
 */

import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'

import { combineAlerts, describeCrossing } from '../Ledger/alerts'
import type { WatchLedger } from '../Ledger/ledger'
import type { NameResolver } from '../Ledger/report'
import type { KeyScheme } from '../lib/config'
import { createLogger, errorMessage } from '../lib/log'
import { formatDuration } from '../Ledger/format'
import { parseIsoDuration, type VideoMetadata } from './VideoCatalog'

const log = createLogger('monitor')

export interface VideoSource {
  currentVideoId(): Promise<string | null>
}

export interface MetadataSource {
  lookup(videoId: string): Promise<VideoMetadata | null>
  recordStart(videoId: string, at: Date): void
  recordEnd(videoId: string, at: Date, durationSeconds: number): void
}

export interface ThemeSource {
  classify(title: string, description: string): Promise<string | null>
}

export interface AlertSink {
  alert(message: string): Promise<boolean>
}

export interface MonitorOptions {
  ledger: WatchLedger
  tv: VideoSource
  videos: MetadataSource
  /** Required for the theme key scheme */
  themes?: ThemeSource | null
  alerts: AlertSink
  keyScheme: KeyScheme
  nameFor: NameResolver
  pollIntervalMs: number
  /** File each detected video id is appended to */
  detectionLog?: string | null
  clock?: () => Date
  print?: (line: string) => void
}

export interface MonitorStats {
  startedAt: Date
  videosDetected: number
  sessionsRecorded: number
  alertsTriggered: number
}

interface Session {
  videoId: string
  startedAt: Date
  metadata: VideoMetadata | null
  /** Set once the catalog holds an open watch for this session */
  watchOpen: boolean
}

export class Monitor {
  private readonly clock: () => Date
  private readonly print: (line: string) => void
  private session: Session | null = null
  private running = false
  private wake: (() => void) | null = null

  readonly stats: MonitorStats

  constructor(private readonly options: MonitorOptions) {
    if (options.keyScheme === 'theme' && !options.themes) {
      throw new Error('The theme key scheme needs a theme classifier (set OPENAI_API_KEY)')
    }
    this.clock = options.clock ?? (() => new Date())
    this.print = options.print ?? ((line) => console.log(line))
    this.stats = { startedAt: this.clock(), videosDetected: 0, sessionsRecorded: 0, alertsTriggered: 0 }
  }

  /** Video of the open session */
  get currentVideoId(): string | null {
    return this.session?.videoId ?? null
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Poll until stop() is called, then close the open session.
   */
  async run(): Promise<MonitorStats> {
    this.running = true
    log.info(`Starting YouTube monitoring (every ${this.options.pollIntervalMs} ms)`)

    while (this.running) {
      await this.tick()
      if (!this.running) break
      await this.wait(this.options.pollIntervalMs)
    }

    await this.finish()
    log.info('Monitoring stopped')
    return this.stats
  }

  /** Ask the loop to end after the current tick */
  stop(): void {
    this.running = false
    this.wake?.()
  }

  /**
   * One poll. Errors are logged and the loop carries on.
   */
  async tick(): Promise<void> {
    try {
      const videoId = await this.options.tv.currentVideoId()
      if (videoId === this.currentVideoId) return

      const now = this.clock()
      await this.closeSession(now)
      if (videoId) await this.openSession(videoId, now)
    } catch (err) {
      log.error('Error during monitoring', err)
    }
  }

  /** Close and record the open session, if any */
  async finish(): Promise<void> {
    try {
      await this.closeSession(this.clock())
    } catch (err) {
      log.error('Error closing the last session', err)
    }
  }

  private async openSession(videoId: string, now: Date): Promise<void> {
    log.info(`New video detected: ${videoId}`)
    this.logDetection(videoId, now)
    const session: Session = { videoId, startedAt: now, metadata: null, watchOpen: false }
    this.session = session
    this.stats.videosDetected++

    const metadata = await this.options.videos.lookup(videoId)
    if (!metadata || this.session !== session) return
    session.metadata = metadata
    this.options.videos.recordStart(videoId, now)
    session.watchOpen = true

    const length = parseIsoDuration(metadata.duration)
    this.print('')
    this.print(`Now watching: "${metadata.title}"${length === null ? '' : ` (${formatDuration(length)})`}`)
    this.print(`Channel: ${metadata.channel}`)
    this.print(`Category: ${this.options.nameFor(metadata.categoryId)}`)
  }

  private async closeSession(now: Date): Promise<void> {
    const session = this.session
    if (!session) return
    this.session = null

    const duration = Math.max(0, (now.getTime() - session.startedAt.getTime()) / 1000)
    if (session.watchOpen) this.options.videos.recordEnd(session.videoId, now, duration)
    const metadata = session.metadata ?? (await this.options.videos.lookup(session.videoId))
    if (!metadata) {
      log.warn(`No metadata for ${session.videoId}, ${duration.toFixed(2)}s not recorded`)
      return
    }
    log.info(`Video ended: "${metadata.title}" (watched for ${duration.toFixed(2)} seconds)`)

    const key = await this.watchKey(metadata)
    if (!key) {
      log.warn(`No ${this.options.keyScheme} for "${metadata.title}", ${duration.toFixed(2)}s not recorded`)
      return
    }

    const outcome = this.options.ledger.record(key, duration, { at: now, videoId: session.videoId })
    if (!outcome.ok) {
      log.error(outcome.error.message)
      return
    }
    this.stats.sessionsRecorded++

    if (outcome.crossings.length === 0) return
    log.warn(`Time limit alerts triggered: ${outcome.crossings.length}`)
    this.stats.alertsTriggered += outcome.crossings.length

    const message = combineAlerts(outcome.crossings.map((crossing) => describeCrossing(crossing, this.options.nameFor)))
    if (message) await this.options.alerts.alert(message)
  }

  private async watchKey(metadata: VideoMetadata): Promise<string | null> {
    if (this.options.keyScheme === 'category') {
      return metadata.categoryId || null
    }
    return this.options.themes ? this.options.themes.classify(metadata.title, metadata.description) : null
  }

  private logDetection(videoId: string, at: Date): void {
    const path = this.options.detectionLog
    if (!path) return
    try {
      mkdirSync(dirname(path), { recursive: true })
      appendFileSync(path, `[${at.toISOString()}] Video ID: ${videoId}\n`)
    } catch (err) {
      log.error(`Error writing to ${path}: ${errorMessage(err)}`)
    }
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null
        resolve()
      }, ms)
      this.wake = () => {
        clearTimeout(timer)
        this.wake = null
        resolve()
      }
    })
  }
}
