/**
 * categories.ts - YouTube category id → display name
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { isRecord } from '../Ledger/documents'
import { ConfigError } from '../Ledger/errors'
import { errorMessage } from './log'
import { CONFIG_DIR } from './paths'

export const CATEGORIES_PATH = join(CONFIG_DIR, 'categories.json')

export function loadCategoryNames(path: string = CATEGORIES_PATH): Map<string, string> {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(path, errorMessage(err), { cause: err })
  }
  if (!isRecord(raw)) throw new ConfigError(path, 'expected an object of id → name')

  const names = new Map<string, string>()
  for (const [id, name] of Object.entries(raw)) {
    if (typeof name !== 'string') throw new ConfigError(path, `name for category ${id} must be a string`)
    names.set(id, name)
  }
  return names
}

export function categoryName(names: ReadonlyMap<string, string>, id: string): string {
  return names.get(id) ?? 'Unknown'
}
