import { describe, test, expect, afterEach, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { configureLogging, createLogger, errorMessage } from './log'

describe('createLogger', () => {
  const dir = mkdtempSync(join(tmpdir(), 'watch-log-'))

  afterEach(() => {
    configureLogging({ file: null, echo: true })
    vi.unstubAllEnvs()
  })

  test('writes component lines to the log file', () => {
    const file = join(dir, 'nested', 'monitor.log')
    configureLogging({ file, echo: false })

    const log = createLogger('ledger')
    log.info('Performing daily watch time reset')
    log.error('Failed to save', new Error('disk full'))

    const lines = readFileSync(file, 'utf-8').trimEnd().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[ledger\] INFO Performing daily watch time reset$/)
    expect(lines[1]).toMatch(/\[ledger\] ERROR Failed to save: disk full$/)
    rmSync(dir, { recursive: true, force: true })
  })

  test('debug lines need WATCH_DEBUG', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    vi.stubEnv('WATCH_DEBUG', '')
    createLogger('tv').debug('hidden')
    expect(write).not.toHaveBeenCalled()

    vi.stubEnv('WATCH_DEBUG', '1')
    createLogger('tv').debug('shown')
    expect(write).toHaveBeenCalledTimes(1)
    write.mockRestore()
  })
})

describe('errorMessage', () => {
  test('uses the message of errors and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage(42)).toBe('42')
  })
})
