/**
 * VideoCatalog - YouTube Data API v3 video metadata with an on-disk cache
 *
 * Lookups hit the cache first; a miss calls
 *   GET https://www.googleapis.com/youtube/v3/videos?part=snippet,contentDetails&id=<id>&key=<key>
 * and stores the result. Request failures are logged and yield null.
 *
 * Each cached video also keeps the history of its watches: one entry per
 * session, opened by recordStart and closed by recordEnd.
 */

import { isRecord } from '../Ledger/documents'
import type { DocumentStore } from '../Ledger/store'
import { fetchJson, type FetchFn } from '../lib/http'
import { createLogger, errorMessage } from '../lib/log'

const log = createLogger('youtube')

export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3'

export interface VideoMetadata {
  videoId: string
  title: string
  description: string
  channel: string
  categoryId: string
  /** ISO 8601 duration as reported, e.g. PT4M13S */
  duration: string
  firstDetected: string
  watches: VideoWatch[]
}

export interface VideoWatch {
  startTime: string
  /** null while the session is open */
  endTime: string | null
  durationSeconds: number | null
}

export type VideoCache = Record<string, VideoMetadata>

export interface VideoCatalogOptions {
  apiKey: string
  cache: DocumentStore<VideoCache>
  fetchFn?: FetchFn
  clock?: () => Date
}

function field(source: Record<string, unknown>, name: string, fallback: string): string {
  const value = source[name]
  return typeof value === 'string' ? value : fallback
}

function parseWatches(raw: unknown): VideoWatch[] {
  if (!Array.isArray(raw)) return []
  const watches: VideoWatch[] = []
  for (const entry of raw) {
    if (!isRecord(entry) || typeof entry.startTime !== 'string') continue
    watches.push({
      startTime: entry.startTime,
      endTime: typeof entry.endTime === 'string' ? entry.endTime : null,
      durationSeconds:
        typeof entry.durationSeconds === 'number' && Number.isFinite(entry.durationSeconds) ? entry.durationSeconds : null,
    })
  }
  return watches
}

function parseEntry(id: string, raw: unknown): VideoMetadata {
  if (!isRecord(raw)) throw new Error(`cached video ${id} must be an object`)
  return {
    videoId: field(raw, 'videoId', id),
    title: field(raw, 'title', 'Unknown'),
    description: field(raw, 'description', ''),
    channel: field(raw, 'channel', 'Unknown'),
    categoryId: field(raw, 'categoryId', ''),
    duration: field(raw, 'duration', ''),
    firstDetected: field(raw, 'firstDetected', ''),
    watches: parseWatches(raw.watches),
  }
}

export function parseVideoCache(raw: unknown): VideoCache {
  if (!isRecord(raw)) throw new Error('video cache must be an object')
  return Object.fromEntries(Object.entries(raw).map(([id, entry]): [string, VideoMetadata] => [id, parseEntry(id, entry)]))
}

/**
 * Seconds in an ISO 8601 duration such as PT1H2M3S, null when unparseable
 */
export function parseIsoDuration(value: string): number | null {
  const match = value.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/)
  if (!match || value === 'P' || value.endsWith('T')) return null
  const [, days, hours, minutes, seconds] = match
  return (
    Number(days ?? 0) * 86400 + Number(hours ?? 0) * 3600 + Number(minutes ?? 0) * 60 + Number(seconds ?? 0)
  )
}

export class VideoCatalog {
  private readonly fetchFn: FetchFn
  private readonly clock: () => Date
  private cache: Map<string, VideoMetadata> | null = null

  constructor(private readonly options: VideoCatalogOptions) {
    this.fetchFn = options.fetchFn ?? fetch
    this.clock = options.clock ?? (() => new Date())
  }

  // a Map, so an id such as "constructor" never resolves through Object.prototype
  private entries(): Map<string, VideoMetadata> {
    if (this.cache === null) {
      this.cache = new Map(Object.entries(this.options.cache.load() ?? {}))
    }
    return this.cache
  }

  async lookup(videoId: string): Promise<VideoMetadata | null> {
    const cached = this.entries().get(videoId)
    if (cached) {
      log.debug(`Using cached data for video ${videoId}`)
      return cached
    }

    let video: VideoMetadata | null
    try {
      video = await this.fetchVideo(videoId)
    } catch (err) {
      log.error(`Error fetching data for video ${videoId}`, err)
      return null
    }
    if (!video) {
      log.warn(`No data found for video ${videoId}`)
      return null
    }

    this.entries().set(videoId, video)
    if (this.persist()) log.info(`Saved video details for ${videoId} - "${video.title}"`)
    return video
  }

  /** Open a watch entry on a cached video */
  recordStart(videoId: string, at: Date): void {
    const video = this.entries().get(videoId)
    if (!video) {
      log.warn(`Cannot record start for unknown video: ${videoId}`)
      return
    }
    video.watches.push({ startTime: at.toISOString(), endTime: null, durationSeconds: null })
    this.persist()
  }

  /** Close the last watch entry of a video, if it is still open */
  recordEnd(videoId: string, at: Date, durationSeconds: number): void {
    const last = this.entries().get(videoId)?.watches.at(-1)
    if (!last || last.endTime !== null) {
      log.warn(`No open watch of ${videoId} to close`)
      return
    }
    last.endTime = at.toISOString()
    last.durationSeconds = durationSeconds
    this.persist()
  }

  private persist(): boolean {
    try {
      this.options.cache.save(Object.fromEntries(this.entries()))
      return true
    } catch (err) {
      log.warn(`Video cache not saved: ${errorMessage(err)}`)
      return false
    }
  }

  private async fetchVideo(videoId: string): Promise<VideoMetadata | null> {
    const params = new URLSearchParams({
      part: 'snippet,contentDetails',
      id: videoId,
      key: this.options.apiKey,
    })
    log.info(`Fetching data for video ${videoId} from YouTube API`)
    const body = await fetchJson(this.fetchFn, `${YOUTUBE_API_BASE}/videos?${params}`)

    if (!isRecord(body) || !Array.isArray(body.items) || body.items.length === 0) return null
    const item: unknown = body.items[0]
    if (!isRecord(item)) return null

    const snippet = isRecord(item.snippet) ? item.snippet : {}
    const details = isRecord(item.contentDetails) ? item.contentDetails : {}

    return {
      videoId,
      title: field(snippet, 'title', 'Unknown'),
      description: field(snippet, 'description', ''),
      channel: field(snippet, 'channelTitle', 'Unknown'),
      categoryId: field(snippet, 'categoryId', ''),
      duration: field(details, 'duration', ''),
      firstDetected: this.clock().toISOString(),
      watches: [],
    }
  }
}
