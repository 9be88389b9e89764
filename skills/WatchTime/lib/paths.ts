/**
 * paths.ts - Filesystem locations for the watch monitor
 */

import { dirname, isAbsolute, join, resolve } from 'path'
import { homedir } from 'os'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export const SKILL_DIR = join(__dirname, '..')
export const CONFIG_DIR = join(SKILL_DIR, 'Config')
export const DEFAULT_CONFIG_PATH = join(CONFIG_DIR, 'watch-monitor.yaml')
export const DEFAULT_DATA_DIR = join(homedir(), '.local', 'share', 'watch-monitor')
export const DEFAULT_ENV_PATH = join(homedir(), '.config', 'watch-monitor', '.env')

/** Expand a leading ~ and resolve relative paths against `base` */
export function resolvePath(path: string, base: string = process.cwd()): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return isAbsolute(path) ? path : resolve(base, path)
}
