import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { configureLogging } from '../lib/log'
import { main } from './WatchMonitor'

describe('WatchMonitor CLI', () => {
  let dir: string
  let output: string[]
  let errors: string[]

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'watch-cli-'))
    writeFileSync(
      join(dir, 'watch-monitor.yaml'),
      ['tracking:', '  time_zone: UTC', 'storage:', '  data_dir: data', 'limits_file: limits.yaml', ''].join('\n')
    )
    writeFileSync(join(dir, 'limits.yaml'), ['daily:', '  total: 7200', '  categories:', '    "20": 1800', ''].join('\n'))

    vi.stubEnv('WATCH_CONFIG', join(dir, 'watch-monitor.yaml'))
    vi.stubEnv('WATCH_ENV_FILE', join(dir, 'missing.env'))
    vi.stubEnv('WATCH_DATA_DIR', '')

    output = []
    errors = []
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line))
    })
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      errors.push(String(line))
    })
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    configureLogging({ file: null })
    process.exitCode = undefined
    rmSync(dir, { recursive: true, force: true })
  })

  test('record adds a session and reports crossings', async () => {
    await main(['record', '20', '1900'])

    expect(output).toEqual([
      '✓ Recorded 31 minutes of Gaming (20)',
      '⚠️  You have exceeded your daily limit of 30 minutes for Gaming videos',
    ])
    expect(process.exitCode).toBeUndefined()
    expect(existsSync(join(dir, 'data', 'watch_time.json'))).toBe(true)
    expect(existsSync(join(dir, 'data', 'monitor.log'))).toBe(true)
  })

  test('record rejects a bad duration', async () => {
    await main(['record', '20', 'soon'])

    expect(errors).toEqual(['❌ Duration must be a finite number of seconds >= 0, got NaN'])
    expect(process.exitCode).toBe(1)
  })

  test('stats --json prints the report', async () => {
    await main(['record', '20', '1900'])
    output = []

    await main(['stats', '--json'])

    const report = JSON.parse(output.join('\n'))
    expect(report.allTime).toEqual({ seconds: 1900, formatted: '31 minutes' })
    expect(report.keys).toHaveLength(1)
    expect(report.keys[0]).toMatchObject({ key: '20', name: 'Gaming', sessions: 1 })
    expect(report.keys[0].periods.daily).toMatchObject({ seconds: 1900, limit: 1800, over: true })
  })

  test('without a command prints usage', async () => {
    await main([])
    expect(output.join('\n')).toContain('YouTube Watch Time Monitor')
  })
})
