/**
 * Spoken alert messages for limit crossings
 */

import { formatDuration } from './format'
import type { Crossing, WatchKey } from './types'

export function describeCrossing(crossing: Crossing, nameFor: (key: WatchKey) => string = (key) => key): string {
  const limit = formatDuration(crossing.limit)
  if (crossing.scope === 'total') {
    return `You have exceeded your ${crossing.period} total watch time limit of ${limit}`
  }
  return `You have exceeded your ${crossing.period} limit of ${limit} for ${nameFor(crossing.key)} videos`
}

/**
 * Fold several messages into one utterance
 */
export function combineAlerts(messages: string[]): string | null {
  if (messages.length === 0) return null
  if (messages.length === 1) return messages[0]
  return `Multiple watch time limits exceeded: ${messages.join('. Also, ')}`
}
