import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { main, parseArguments, parseStart, settingsFromArguments } from './cli'
import { SettingsError } from './stores/SettingsStore'
import { TEST_SPECIFICATION_JSON, concat, measurementPacket } from './domain/test-helpers'

describe('parseArguments', () => {
  it('separates files from options', () => {
    const args = parseArguments(['a.vbus', '--out', 'tables', 'b.vbus', '--tz', 'Europe/Berlin'])
    expect(args.files).toEqual(['a.vbus', 'b.vbus'])
    expect(Object.fromEntries(args.values)).toEqual({ '--out': 'tables', '--tz': 'Europe/Berlin' })
    expect(args.help).toBe(false)
  })

  it('rejects unknown options and missing values', () => {
    expect(() => parseArguments(['--verbose'])).toThrow('Unknown option --verbose')
    expect(() => parseArguments(['a.vbus', '--out'])).toThrow('--out needs a value')
  })
})

describe('settingsFromArguments', () => {
  it('turns flags into validated settings', () => {
    const values = new Map([['--interval', '300'], ['--delimiter', 'comma'], ['--style', 'dmy']])
    expect(settingsFromArguments(values)).toEqual({
      samplingIntervalSeconds: 300,
      delimiter: ',',
      timestampStyle: 'dmy',
    })
  })

  it('rejects bad values', () => {
    expect(() => settingsFromArguments(new Map([['--interval', 'soon']]))).toThrow(SettingsError)
    expect(() => settingsFromArguments(new Map([['--tz', 'Moon/Base']]))).toThrow('--tz: unknown time zone "Moon/Base"')
  })
})

describe('parseStart', () => {
  it('reads ISO dates', () => {
    expect(parseStart('2024-05-01T06:00:00Z')).toBe(Date.UTC(2024, 4, 1, 6))
    expect(() => parseStart('yesterday')).toThrow('--start: cannot parse "yesterday" as a date')
  })
})

describe('main', () => {
  let dir = ''

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    dir = mkdtempSync(join(tmpdir(), 'vbus-cli-'))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  it('converts files and exits with 0', async () => {
    const config = join(dir, 'settings.json')
    writeFileSync(join(dir, 'spec.json'), JSON.stringify(TEST_SPECIFICATION_JSON))
    writeFileSync(config, JSON.stringify({ specificationFile: 'spec.json' }))
    const recording = join(dir, '20240501.vbus')
    writeFileSync(recording, concat(measurementPacket(100, 250), measurementPacket(100, 250)))

    const code = await main([recording, '--out', join(dir, 'out'), '--config', config, '--delimiter', 'comma'])

    expect(code).toBe(0)
    expect(readFileSync(join(dir, 'out', '20240501_0001_0002.csv'), 'utf8')).toBe(
      'Timestamp,Speed [%],Temp [°C]\n'
      + '2024-05-01 00:00:00,10.0,25.0\n'
      + '2024-05-01 00:01:00,10.0,25.0\n',
    )
    expect(console.log).toHaveBeenCalledWith('20240501.vbus: 100% Complete!')
  })

  it('exits with 1 when a file fails', async () => {
    const code = await main([join(dir, 'missing.vbus'), '--out', join(dir, 'out')])
    expect(code).toBe(1)
    expect(existsSync(join(dir, 'out'))).toBe(false)
  })

  it('prints usage without files', async () => {
    expect(await main(['--help'])).toBe(0)
    expect(await main([])).toBe(1)
  })

  it('reports settings errors before converting', async () => {
    expect(await main(['a.vbus', '--interval', '-5'])).toBe(1)
    expect(console.error).toHaveBeenCalledWith('--interval: expected a positive number, got "-5"')
  })
})
