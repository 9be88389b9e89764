/**
 * Watch-time accounting
 *
 * Ledger, reset scheduling, limit crossings and reporting.
 */

export {
  WatchLedger,
  type LedgerOptions,
  type RecordOptions,
  type RecordOutcome,
  type KeyTotals,
} from './ledger'

export { ResetScheduler, calendarDate, isResetDue, localTimeZone, parseResetTimestamp } from './schedule'
export { crosses, evaluateCrossing, limitFor } from './threshold'
export { formatDuration } from './format'
export { describeCrossing, combineAlerts } from './alerts'
export { loadLimits, parseLimits } from './limits'
export { JsonFileStore, MemoryStore, type DocumentStore } from './store'
export { emptyLedgerDocument, parseLedgerDocument, parseResetDocument } from './documents'

export {
  generateReport,
  formatReport,
  getQuickSummary,
  type WatchReport,
  type KeyReport,
  type PeriodFigure,
  type NameResolver,
} from './report'

export {
  LedgerError,
  PersistenceError,
  ConfigError,
  InvalidDurationError,
  InvalidKeyError,
  type LedgerErrorKind,
} from './errors'

export {
  PERIODS,
  TOTAL,
  isPeriod,
  type WatchKey,
  type Period,
  type LimitTarget,
  type Crossing,
  type LimitConfig,
  type PeriodLimits,
  type LedgerDocument,
  type ResetDocument,
} from './types'
