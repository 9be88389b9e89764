/**
 * testing.ts - In-process fetch stand-in for the API client tests
 */

import type { FetchFn } from './http'

export interface FetchCall {
  url: string
  init: RequestInit | undefined
}

export type FetchHandler = (url: string, init: RequestInit | undefined) => Response | Promise<Response>

export function stubFetch(handler: FetchHandler): { fetchFn: FetchFn; calls: FetchCall[] } {
  const calls: FetchCall[] = []
  const fetchFn: FetchFn = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    calls.push({ url, init })
    return handler(url, init)
  }
  return { fetchFn, calls }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

/** Parsed JSON body of a recorded request */
export function requestBody(call: FetchCall): unknown {
  const body = call.init?.body
  return typeof body === 'string' ? JSON.parse(body) : null
}
