/**
 * Ledger error taxonomy
 */

export type LedgerErrorKind = 'persistence' | 'config' | 'invalid-duration' | 'invalid-key'

export class LedgerError extends Error {
  constructor(
    readonly kind: LedgerErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'LedgerError'
  }
}

/** A document could not be read or written; in-memory state is kept */
export class PersistenceError extends LedgerError {
  constructor(
    readonly path: string,
    readonly operation: 'read' | 'write',
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('persistence', `Failed to ${operation} ${path}: ${reason}`, { cause })
    this.name = 'PersistenceError'
  }
}

/** Configuration missing or malformed; fatal at startup */
export class ConfigError extends LedgerError {
  constructor(
    readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super('config', `Invalid configuration in ${path}: ${detail}`, options)
    this.name = 'ConfigError'
  }
}

export class InvalidDurationError extends LedgerError {
  constructor(readonly value: number) {
    super('invalid-duration', `Duration must be a finite number of seconds >= 0, got ${value}`)
    this.name = 'InvalidDurationError'
  }
}

export class InvalidKeyError extends LedgerError {
  constructor(readonly value: string) {
    super('invalid-key', `Watch key must be a non-empty string, got ${JSON.stringify(value)}`)
    this.name = 'InvalidKeyError'
  }
}
