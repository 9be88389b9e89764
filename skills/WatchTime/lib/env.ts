/**
 * env.ts - Secrets and overrides from a .env file and the process environment
 *
 * The .env file holds `KEY=value` lines; `#` starts a comment line and values
 * may be wrapped in single or double quotes. process.env wins over the file.
 */

import { existsSync, readFileSync } from 'fs'
import { createLogger, errorMessage } from './log'

const log = createLogger('env')

export function parseEnv(content: string): Map<string, string> {
  const envVars = new Map<string, string>()

  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    const [key, ...valueParts] = trimmed.split('=')
    if (!key || valueParts.length === 0) continue

    let value = valueParts.join('=').trim()
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1)
    }
    envVars.set(key.trim().replace(/^export\s+/, ''), value)
  }

  return envVars
}

export function loadEnv(path: string): Map<string, string> {
  if (!existsSync(path)) return new Map()

  try {
    return parseEnv(readFileSync(path, 'utf-8'))
  } catch (error) {
    log.warn(`Failed to read ${path}: ${errorMessage(error)}`)
    return new Map()
  }
}

export type EnvLookup = (name: string) => string | undefined

export function envLookup(fileVars: Map<string, string>, env: NodeJS.ProcessEnv = process.env): EnvLookup {
  return (name) => {
    const fromProcess = env[name]
    if (fromProcess !== undefined && fromProcess !== '') return fromProcess
    return fileVars.get(name)
  }
}
