/**
 * TvConnection - Samsung TV status over the local REST API (port 8001)
 *
 *   GET /api/v2/                      device info, doubles as power probe
 *   GET /api/v2/applications/<appId>  status of one app
 *
 * An unreachable TV is the normal "off" state and is reported as null rather
 * than thrown.
 */

import { isRecord } from '../Ledger/documents'
import { fetchJson, type FetchFn } from '../lib/http'
import { createLogger, errorMessage } from '../lib/log'

const log = createLogger('tv')

export interface TvOptions {
  host: string
  port?: number
  youtubeAppId: string
  fetchFn?: FetchFn
  timeoutMs?: number
}

export interface DeviceInfo {
  name: string
  model: string
  /** False only when the TV reports standby */
  poweredOn: boolean
}

export interface AppStatus {
  id: string
  name: string
  running: boolean
  visible: boolean
  url: string | null
}

/**
 * Pull a video id out of a YouTube watch or short URL.
 */
export function extractVideoId(url: string): string | null {
  const watch = url.match(/youtube\.com\/watch\?(?:.*&)?v=([^&#]+)/)
  if (watch) return watch[1]

  const short = url.match(/youtu\.be\/([^?&#/]+)/)
  if (short) return short[1]

  if (url.includes('youtube.com')) {
    log.debug(`YouTube URL without a video id: ${url}`)
  }
  return null
}

function text(value: unknown, fallback: string): string {
  return typeof value === 'string' && value !== '' ? value : fallback
}

export class TvConnection {
  private readonly baseUrl: string
  private readonly fetchFn: FetchFn
  private readonly timeoutMs: number
  private poweredOn: boolean | null = null

  constructor(private readonly options: TvOptions) {
    this.baseUrl = `http://${options.host}:${options.port ?? 8001}/api/v2`
    this.fetchFn = options.fetchFn ?? fetch
    this.timeoutMs = options.timeoutMs ?? 3000
  }

  async deviceInfo(): Promise<DeviceInfo | null> {
    let body: unknown
    try {
      body = await fetchJson(this.fetchFn, `${this.baseUrl}/`, {}, this.timeoutMs)
    } catch (err) {
      log.debug(`TV not reachable at ${this.options.host}: ${errorMessage(err)}`)
      return null
    }
    if (!isRecord(body)) return null

    const device = isRecord(body.device) ? body.device : {}
    return {
      name: text(device.name, text(body.name, 'Unknown')),
      model: text(device.modelName, 'Unknown'),
      poweredOn: device.PowerState !== 'standby',
    }
  }

  async appStatus(appId: string = this.options.youtubeAppId): Promise<AppStatus | null> {
    let body: unknown
    try {
      body = await fetchJson(this.fetchFn, `${this.baseUrl}/applications/${appId}`, {}, this.timeoutMs)
    } catch (err) {
      log.debug(`App status for ${appId} unavailable: ${errorMessage(err)}`)
      return null
    }
    if (!isRecord(body)) return null

    return {
      id: text(body.id, appId),
      name: text(body.name, 'Unknown'),
      running: body.running === true,
      visible: body.visible === true,
      url: typeof body.url === 'string' ? body.url : null,
    }
  }

  /**
   * Id of the YouTube video on screen, or null when the TV is off, another
   * app is in front or the status carries no watch URL.
   */
  async currentVideoId(): Promise<string | null> {
    const info = await this.deviceInfo()
    const poweredOn = info !== null && info.poweredOn
    if (poweredOn !== this.poweredOn) {
      log.info(poweredOn ? 'TV powered on' : 'TV powered off or in standby')
      this.poweredOn = poweredOn
    }
    if (!poweredOn) return null

    const status = await this.appStatus()
    if (!status || !status.running || !status.visible) return null

    if (!status.url) {
      log.debug('YouTube is running but reports no video URL')
      return null
    }
    return extractVideoId(status.url)
  }
}
