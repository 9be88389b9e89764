/**
 * Document stores
 *
 * JsonFileStore writes through a temp file in the same directory and renames
 * it over the target, so a crash mid-write leaves either the old or the new
 * document. Unparseable documents are moved aside as
 * `<name>.corrupt-<epoch ms>` and reported as missing.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs'
import { basename, dirname, join } from 'path'
import { createLogger, errorMessage } from '../lib/log'
import { PersistenceError } from './errors'

const log = createLogger('store')

export interface DocumentStore<T> {
  /** Where the document lives, for messages */
  readonly location: string
  /** The stored document, or null when there is none yet */
  load(): T | null
  /** Replace the stored document; throws PersistenceError */
  save(doc: T): void
}

export class JsonFileStore<T> implements DocumentStore<T> {
  constructor(
    readonly location: string,
    private readonly parse: (raw: unknown) => T
  ) {}

  load(): T | null {
    if (!existsSync(this.location)) return null

    let content: string
    try {
      content = readFileSync(this.location, 'utf-8')
    } catch (err) {
      throw new PersistenceError(this.location, 'read', err)
    }

    try {
      return this.parse(JSON.parse(content))
    } catch (err) {
      const aside = join(dirname(this.location), `${basename(this.location)}.corrupt-${Date.now()}`)
      try {
        renameSync(this.location, aside)
        log.warn(`Unreadable document ${this.location} moved to ${aside}: ${errorMessage(err)}`)
      } catch (renameErr) {
        throw new PersistenceError(this.location, 'read', renameErr)
      }
      return null
    }
  }

  save(doc: T): void {
    const tmp = join(dirname(this.location), `.${basename(this.location)}.${process.pid}.tmp`)
    try {
      mkdirSync(dirname(this.location), { recursive: true })
      writeFileSync(tmp, JSON.stringify(doc, null, 2) + '\n')
      renameSync(tmp, this.location)
    } catch (err) {
      if (existsSync(tmp)) {
        try {
          unlinkSync(tmp)
        } catch (cleanupErr) {
          log.warn(`Could not remove ${tmp}: ${errorMessage(cleanupErr)}`)
        }
      }
      throw new PersistenceError(this.location, 'write', err)
    }
  }
}

/**
 * In-process store. `failWrites` makes every save throw, for exercising the
 * persistence-failure path.
 */
export class MemoryStore<T> implements DocumentStore<T> {
  failWrites = false
  saves = 0

  constructor(
    private doc: T | null = null,
    readonly location = 'memory'
  ) {}

  load(): T | null {
    return this.doc === null ? null : structuredClone(this.doc)
  }

  save(doc: T): void {
    if (this.failWrites) {
      throw new PersistenceError(this.location, 'write', new Error('write disabled'))
    }
    this.doc = structuredClone(doc)
    this.saves++
  }

  /** The last saved document */
  peek(): T | null {
    return this.doc
  }
}
