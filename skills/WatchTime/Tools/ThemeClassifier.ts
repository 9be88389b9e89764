/**
 * ThemeClassifier - One-word video themes from OpenAI chat completions
 *
 * Themes are cached by `<title>:<first 100 chars of description>`. A failed
 * request is retried with exponential backoff (1s, 2s); after the last attempt
 * the classifier gives up and returns null.
 */

import { isRecord } from '../Ledger/documents'
import type { DocumentStore } from '../Ledger/store'
import { fetchJson, type FetchFn } from '../lib/http'
import { createLogger, errorMessage } from '../lib/log'

const log = createLogger('themes')

export const OPENAI_API_BASE = 'https://api.openai.com/v1'
const DEFAULT_MODEL = 'gpt-4-turbo'

const SYSTEM_PROMPT = 'You are a video theme classifier that responds with a single theme word.'

export type ThemeCache = Record<string, string>

export interface ThemeClassifierOptions {
  apiKey: string
  cache: DocumentStore<ThemeCache>
  model?: string
  attempts?: number
  fetchFn?: FetchFn
  sleep?: (ms: number) => Promise<void>
}

export function parseThemeCache(raw: unknown): ThemeCache {
  if (!isRecord(raw)) throw new Error('theme cache must be an object')
  const cache: ThemeCache = {}
  for (const [key, theme] of Object.entries(raw)) {
    if (typeof theme === 'string') cache[key] = theme
  }
  return cache
}

export function themeCacheKey(title: string, description: string): string {
  return `${title}:${description.slice(0, 100)}`
}

/** Lowercase first word of the reply with punctuation removed */
export function normalizeTheme(reply: string): string | null {
  const word = reply.trim().toLowerCase().split(/\s+/)[0] ?? ''
  const theme = word.replace(/[.,!?;:"'`]/g, '')
  return theme === '' ? null : theme
}

function buildPrompt(title: string, description: string): string {
  return [
    'Analyze the following YouTube video and classify it into a single specific theme category.',
    '',
    `Title: ${title}`,
    `Description: ${description.slice(0, 500)}`,
    '',
    'Respond with just one word representing the theme category. ' +
      'Choose from themes like: sports, baseball, football, basketball, gaming, news, politics, ' +
      'music, cooking, tech, science, movies, education, finance, travel, etc. ' +
      "Be specific where possible (e.g., use 'baseball' instead of just 'sports' if it's clearly about baseball).",
  ].join('\n')
}

function replyText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null
  const choice: unknown = body.choices[0]
  if (!isRecord(choice) || !isRecord(choice.message)) return null
  return typeof choice.message.content === 'string' ? choice.message.content : null
}

export class ThemeClassifier {
  private readonly fetchFn: FetchFn
  private readonly sleep: (ms: number) => Promise<void>
  private readonly attempts: number
  private cache: ThemeCache | null = null

  constructor(private readonly options: ThemeClassifierOptions) {
    this.fetchFn = options.fetchFn ?? fetch
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
    this.attempts = Math.max(1, options.attempts ?? 3)
  }

  private entries(): ThemeCache {
    if (this.cache === null) {
      this.cache = this.options.cache.load() ?? {}
    }
    return this.cache
  }

  async classify(title: string, description: string): Promise<string | null> {
    const key = themeCacheKey(title, description)
    const entries = this.entries()
    if (Object.hasOwn(entries, key)) return entries[key]

    for (let attempt = 0; attempt < this.attempts; attempt++) {
      try {
        const theme = await this.request(title, description)
        entries[key] = theme
        this.saveCache(entries)
        log.info(`Classified "${title}" as ${theme}`)
        return theme
      } catch (err) {
        log.warn(`Error classifying theme (attempt ${attempt + 1}/${this.attempts}): ${errorMessage(err)}`)
        if (attempt < this.attempts - 1) {
          await this.sleep(1000 * 2 ** attempt)
        }
      }
    }

    log.error(`Giving up on theme for "${title}"`)
    return null
  }

  private async request(title: string, description: string): Promise<string> {
    const body = await fetchJson(this.fetchFn, `${OPENAI_API_BASE}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model ?? DEFAULT_MODEL,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildPrompt(title, description) },
        ],
        temperature: 0.3,
        max_tokens: 20,
      }),
    })

    const reply = replyText(body)
    const theme = reply === null ? null : normalizeTheme(reply)
    if (theme === null) throw new Error('empty theme in response')
    return theme
  }

  private saveCache(entries: ThemeCache): void {
    try {
      this.options.cache.save(entries)
    } catch (err) {
      log.warn(`Theme cache not saved: ${errorMessage(err)}`)
    }
  }
}
