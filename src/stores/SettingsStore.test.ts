import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_SETTINGS, SettingsError, SettingsStore, parseDelimiter, parseSettings } from './SettingsStore'

describe('parseDelimiter', () => {
  it('accepts names and single characters', () => {
    expect(parseDelimiter('tab')).toBe('\t')
    expect(parseDelimiter('Comma')).toBe(',')
    expect(parseDelimiter('semicolon')).toBe(';')
    expect(parseDelimiter('|')).toBe('|')
  })

  it('rejects what would corrupt the table', () => {
    expect(() => parseDelimiter('.')).toThrow(SettingsError)
    expect(() => parseDelimiter('ab')).toThrow('Unsupported delimiter "ab"')
  })
})

describe('parseSettings', () => {
  it('validates every known key', () => {
    expect(parseSettings({
      timeZone: 'Europe/Berlin',
      timestampStyle: 'dmy',
      delimiter: 'semicolon',
      samplingIntervalSeconds: 30,
      cycleRule: { type: 'leading-command', command: '0x0100' },
      specificationFile: 'tables/custom.json',
      outputExtension: '.txt',
    }, '/srv/vbus')).toEqual({
      timeZone: 'Europe/Berlin',
      timestampStyle: 'dmy',
      delimiter: ';',
      samplingIntervalSeconds: 30,
      cycleRule: { type: 'leading-command', command: 0x0100 },
      specificationFile: '/srv/vbus/tables/custom.json',
      outputExtension: '.txt',
    })
  })

  it('reads the shorthand cycle rule', () => {
    expect(parseSettings({ cycleRule: 'repeated-command' }, '/')).toEqual({ cycleRule: { type: 'repeated-command' } })
    expect(parseSettings({ cycleRule: { type: 'fixed-length', frames: 3 } }, '/'))
      .toEqual({ cycleRule: { type: 'fixed-length', frames: 3 } })
  })

  it('rejects bad values with the key name', () => {
    expect(() => parseSettings({ timeZone: 'Nowhere/Special' }, '/')).toThrow('timeZone: unknown time zone "Nowhere/Special"')
    expect(() => parseSettings({ samplingIntervalSeconds: 0 }, '/')).toThrow('samplingIntervalSeconds')
    expect(() => parseSettings({ cycleRule: { type: 'fixed-length', frames: 0 } }, '/')).toThrow('cycleRule.frames')
    expect(() => parseSettings({ outputExtension: 'csv' }, '/')).toThrow('outputExtension')
  })

  it('rejects unknown keys', () => {
    expect(() => parseSettings({ delimeter: 'tab' }, '/')).toThrow('Unknown setting "delimeter"')
    expect(() => parseSettings([], '/')).toThrow('Config must be a JSON object')
  })
})

describe('SettingsStore', () => {
  let dir = ''
  let store: SettingsStore

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vbus-settings-'))
    store = new SettingsStore()
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('starts from the defaults', () => {
    expect(store.settings).toEqual(DEFAULT_SETTINGS)
    expect(store.samplingIntervalMs).toBe(60_000)
    expect(store.cycleBoundaryRule.name).toBe('repeated-command')
    expect(store.serializerOptions.delimiter).toBe('\t')
  })

  it('loads a config file over the defaults', () => {
    const path = join(dir, 'vbus-convert.json')
    writeFileSync(path, JSON.stringify({ timestampStyle: 'dmy', cycleRule: { type: 'fixed-length', frames: 2 } }))

    store.loadFromFile(path)

    expect(store.sourcePath).toBe(path)
    expect(store.settings.timeZone).toBe('UTC')
    expect(store.cycleBoundaryRule.name).toBe('fixed-length(2)')
    expect(store.serializerOptions.formatTimestamp?.(Date.UTC(2024, 4, 1, 6))).toBe('01.05.2024 06:00:00')
  })

  it('names the file in errors', () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{')
    expect(() => store.loadFromFile(path)).toThrow(`Cannot read config ${path}`)

    writeFileSync(path, '{"colour": "blue"}')
    expect(() => store.loadFromFile(path)).toThrow(`${path}: Unknown setting "colour"`)
    expect(store.sourcePath).toBeNull()
  })

  it('applies overrides and resets', () => {
    store.update({ samplingIntervalSeconds: 10, delimiter: ',' })
    expect(store.samplingIntervalMs).toBe(10_000)
    expect(store.settings.delimiter).toBe(',')

    store.reset()
    expect(store.settings).toEqual(DEFAULT_SETTINGS)
  })
})
