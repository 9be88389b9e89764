/**
 * Human-readable durations
 *
 *   0     -> "0 seconds"
 *   59    -> "59 seconds"
 *   61    -> "1 minute"
 *   3661  -> "1h 1m"
 */

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`
}

export function formatDuration(seconds: number): string {
  const whole = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0

  if (whole < 60) {
    return plural(whole, 'second')
  }

  const minutes = Math.floor(whole / 60)
  if (minutes < 60) {
    return plural(minutes, 'minute')
  }

  const hours = Math.floor(minutes / 60)
  return `${hours}h ${minutes % 60}m`
}
