/**
 * log.ts - Component loggers
 *
 * Lines look like `[2024-05-01T10:00:00.000Z] [ledger] INFO message` and go to
 * stderr plus, once configured, an append-only log file in the data dir.
 * DEBUG lines are dropped unless WATCH_DEBUG is set.
 */

import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, err?: unknown): void
}

let logFile: string | null = null
let echo = true

export function configureLogging(options: { file?: string | null; echo?: boolean }): void {
  if (options.echo !== undefined) echo = options.echo
  if (options.file === undefined) return

  logFile = options.file
  if (logFile) {
    try {
      mkdirSync(dirname(logFile), { recursive: true })
    } catch (err) {
      process.stderr.write(`log directory unavailable (${errorMessage(err)}), logging to stderr only\n`)
      logFile = null
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function write(component: string, level: LogLevel, message: string): void {
  if (level === 'DEBUG' && !process.env.WATCH_DEBUG) return

  const line = `[${new Date().toISOString()}] [${component}] ${level} ${message}\n`
  if (echo) process.stderr.write(line)
  if (!logFile) return

  try {
    appendFileSync(logFile, line)
  } catch (err) {
    // Fall back to stderr for the rest of the process
    process.stderr.write(`cannot append to ${logFile}: ${errorMessage(err)}\n`)
    logFile = null
    if (!echo) process.stderr.write(line)
  }
}

export function createLogger(component: string): Logger {
  return {
    debug: (message) => write(component, 'DEBUG', message),
    info: (message) => write(component, 'INFO', message),
    warn: (message) => write(component, 'WARN', message),
    error: (message, err) =>
      write(component, 'ERROR', err === undefined ? message : `${message}: ${errorMessage(err)}`),
  }
}
