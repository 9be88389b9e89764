/**
 * VoiceAlert - Console banner plus a spoken message via the local voice server
 *
 * The voice server takes POST /notify with { message, priority } and answers
 * GET /health. It is optional: when it is down the alert is still printed and
 * logged.
 */

import { fetchOk, type FetchFn } from '../lib/http'
import { createLogger, errorMessage } from '../lib/log'

const log = createLogger('alert')

export type AlertPriority = 'low' | 'normal' | 'high'

export interface VoiceAlertOptions {
  url: string
  enabled?: boolean
  priority?: AlertPriority
  fetchFn?: FetchFn
  /** Where the banner goes, default console.log */
  print?: (line: string) => void
}

export class VoiceAlert {
  private readonly fetchFn: FetchFn
  private readonly print: (line: string) => void

  constructor(private readonly options: VoiceAlertOptions) {
    this.fetchFn = options.fetchFn ?? fetch
    this.print = options.print ?? ((line) => console.log(line))
  }

  get enabled(): boolean {
    return this.options.enabled ?? true
  }

  /**
   * Show and speak `message`. Resolves true when the voice server accepted it.
   */
  async alert(message: string): Promise<boolean> {
    this.print('')
    this.print('!'.repeat(60))
    this.print(`ALERT: ${message}`)
    this.print('!'.repeat(60))
    log.warn(`ALERT: ${message}`)

    if (!this.enabled) return false

    try {
      await fetchOk(
        this.fetchFn,
        `${this.options.url}/notify`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ message, priority: this.options.priority ?? 'high' }),
        },
        5000
      )
      return true
    } catch (err) {
      log.warn(`Voice server unavailable at ${this.options.url}: ${errorMessage(err)}`)
      return false
    }
  }

  async health(): Promise<boolean> {
    try {
      await fetchOk(this.fetchFn, `${this.options.url}/health`, {}, 3000)
      return true
    } catch (err) {
      log.debug(`Voice server health check failed: ${errorMessage(err)}`)
      return false
    }
  }
}
