/**
 * http.ts - JSON over fetch for the API clients
 */

export type FetchFn = typeof fetch

/** Strip credentials from a URL before it reaches a log line */
export function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/g, '$1***')
}

export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    body: string
  ) {
    super(`HTTP ${status} from ${redactUrl(url)}${body ? `: ${body.slice(0, 200)}` : ''}`)
    this.name = 'HttpError'
  }
}

/**
 * Fetch `url`, throwing HttpError on a non-2xx status. Network failures and
 * timeouts reject with fetch's own error.
 */
export async function fetchOk(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit = {},
  timeoutMs = 10_000
): Promise<Response> {
  const response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })

  if (!response.ok) {
    throw new HttpError(url, response.status, await response.text())
  }

  return response
}

export async function fetchJson(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit = {},
  timeoutMs = 10_000
): Promise<unknown> {
  const response = await fetchOk(fetchFn, url, init, timeoutMs)
  return response.json()
}
