import { describe, test, expect, vi } from 'vitest'
import { MemoryStore } from '../Ledger/store'
import { jsonResponse, requestBody, stubFetch, type FetchHandler } from '../lib/testing'
import { ThemeClassifier, normalizeTheme, themeCacheKey, type ThemeCache } from './ThemeClassifier'

function reply(content: string) {
  return jsonResponse({ choices: [{ message: { role: 'assistant', content } }] })
}

function classifier(handler: FetchHandler, cache = new MemoryStore<ThemeCache>()) {
  const { fetchFn, calls } = stubFetch(handler)
  const sleep = vi.fn(async (_ms: number) => {})
  const themes = new ThemeClassifier({ apiKey: 'test-secret', cache, fetchFn, sleep })
  return { themes, calls, sleep, cache }
}

describe('normalizeTheme', () => {
  test('one lowercase word without punctuation', () => {
    expect(normalizeTheme('Baseball.')).toBe('baseball')
    expect(normalizeTheme('  Gaming!\n')).toBe('gaming')
    expect(normalizeTheme('science fiction')).toBe('science')
  })

  test('null when nothing is left', () => {
    expect(normalizeTheme('')).toBeNull()
    expect(normalizeTheme('...')).toBeNull()
  })
})

describe('ThemeClassifier', () => {
  test('asks the model once and caches the theme', async () => {
    const { themes, calls, cache } = classifier(() => reply('Cooking.'))

    expect(await themes.classify('Sourdough at home', 'Bread from scratch')).toBe('cooking')
    expect(await themes.classify('Sourdough at home', 'Bread from scratch')).toBe('cooking')
    expect(calls).toHaveLength(1)
    expect(cache.peek()).toEqual({ 'Sourdough at home:Bread from scratch': 'cooking' })

    expect(calls[0].url).toBe('https://api.openai.com/v1/chat/completions')
    expect(calls[0].init?.method).toBe('POST')
    expect(calls[0].init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    })
    expect(requestBody(calls[0])).toMatchObject({ model: 'gpt-4-turbo', temperature: 0.3, max_tokens: 20 })
  })

  test('the cache key uses the first 100 characters of the description', async () => {
    const { themes, calls } = classifier(() => reply('news'))
    const head = 'a'.repeat(100)

    await themes.classify('Evening bulletin', head + 'first ending')
    await themes.classify('Evening bulletin', head + 'second ending')
    expect(calls).toHaveLength(1)
    expect(themeCacheKey('Evening bulletin', head + 'xyz')).toBe(`Evening bulletin:${head}`)
  })

  test('retries with backoff before succeeding', async () => {
    let attempt = 0
    const { themes, calls, sleep } = classifier(() => (++attempt < 3 ? jsonResponse({}, 500) : reply('News')))

    expect(await themes.classify('Evening bulletin', '')).toBe('news')
    expect(calls).toHaveLength(3)
    expect(sleep.mock.calls).toEqual([[1000], [2000]])
  })

  test('gives up after three attempts', async () => {
    const { themes, calls, sleep, cache } = classifier(() => {
      throw new TypeError('fetch failed')
    })

    expect(await themes.classify('Anything', '')).toBeNull()
    expect(calls).toHaveLength(3)
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(cache.peek()).toBeNull()
  })

  test('an empty reply counts as a failure', async () => {
    const { themes, calls } = classifier(() => reply('  '))
    expect(await themes.classify('Anything', '')).toBeNull()
    expect(calls).toHaveLength(3)
  })

  test('uses themes cached by an earlier run', async () => {
    const cache = new MemoryStore<ThemeCache>({ 'Old title:': 'travel' })
    const { themes, calls } = classifier(() => reply('other'), cache)
    expect(await themes.classify('Old title', '')).toBe('travel')
    expect(calls).toHaveLength(0)
  })
})
