import { makeAutoObservable } from 'mobx'
import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import {
  type CycleBoundaryRule,
  fixedLengthRule,
  leadingCommandRule,
  repeatedCommandRule,
} from '../domain/records/cycleRules'
import {
  type TimestampStyle,
  createTimestampFormatter,
  isValidTimeZone,
} from '../domain/export/formatting'
import type { SerializerOptions } from '../domain/export/TabularSerializer'

export type CycleRuleSetting =
  | { type: 'repeated-command' }
  | { type: 'fixed-length'; frames: number }
  | { type: 'leading-command'; command: number }

export interface ConverterSettings {
  /** IANA zone the timestamp column is written in */
  timeZone: string
  timestampStyle: TimestampStyle
  timestampLabel: string
  delimiter: string
  samplingIntervalSeconds: number
  cycleRule: CycleRuleSetting
  /** Substitute specification table; null uses the built-in one */
  specificationFile: string | null
  outputExtension: string
}

export const DEFAULT_SETTINGS: ConverterSettings = {
  timeZone: 'UTC',
  timestampStyle: 'iso',
  timestampLabel: 'Timestamp',
  delimiter: '\t',
  samplingIntervalSeconds: 60,
  cycleRule: { type: 'repeated-command' },
  specificationFile: null,
  outputExtension: '.csv',
}

export const CONFIG_FILENAME = 'vbus-convert.json'

const DELIMITER_NAMES: Record<string, string> = {
  tab: '\t',
  comma: ',',
  semicolon: ';',
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingsError'
  }
}

/** "tab", "comma", "semicolon" or a single literal character */
export function parseDelimiter(value: string): string {
  const named = DELIMITER_NAMES[value.toLowerCase()]
  if (named) return named
  if (value.length === 1 && value !== '"' && value !== '.') return value
  throw new SettingsError(`Unsupported delimiter ${JSON.stringify(value)}`)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseCycleRule(value: unknown): CycleRuleSetting {
  if (value === 'repeated-command') return { type: 'repeated-command' }
  if (!isObject(value)) {
    throw new SettingsError('cycleRule: expected "repeated-command" or an object with a "type"')
  }

  switch (value.type) {
    case 'repeated-command':
      return { type: 'repeated-command' }
    case 'fixed-length': {
      const frames = value.frames
      if (typeof frames !== 'number' || !Number.isInteger(frames) || frames < 1) {
        throw new SettingsError('cycleRule.frames: expected a positive integer')
      }
      return { type: 'fixed-length', frames }
    }
    case 'leading-command': {
      const command = typeof value.command === 'string' ? Number(value.command) : value.command
      if (typeof command !== 'number' || !Number.isInteger(command) || command < 0 || command > 0xFFFF) {
        throw new SettingsError('cycleRule.command: expected a 16-bit command')
      }
      return { type: 'leading-command', command }
    }
    default:
      throw new SettingsError(`cycleRule.type: unknown rule ${JSON.stringify(value.type)}`)
  }
}

/**
 * Validate a parsed config file. Unknown keys are rejected so typos surface.
 * Relative `specificationFile` paths resolve against `baseDir`.
 */
export function parseSettings(data: unknown, baseDir: string): Partial<ConverterSettings> {
  if (!isObject(data)) {
    throw new SettingsError('Config must be a JSON object')
  }

  const result: Partial<ConverterSettings> = {}

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'timeZone':
        if (typeof value !== 'string' || !isValidTimeZone(value)) {
          throw new SettingsError(`timeZone: unknown time zone ${JSON.stringify(value)}`)
        }
        result.timeZone = value
        break
      case 'timestampStyle':
        if (value !== 'iso' && value !== 'dmy') {
          throw new SettingsError('timestampStyle: expected "iso" or "dmy"')
        }
        result.timestampStyle = value
        break
      case 'timestampLabel':
        if (typeof value !== 'string' || value.length === 0) {
          throw new SettingsError('timestampLabel: expected a non-empty string')
        }
        result.timestampLabel = value
        break
      case 'delimiter':
        if (typeof value !== 'string') {
          throw new SettingsError('delimiter: expected a string')
        }
        result.delimiter = parseDelimiter(value)
        break
      case 'samplingIntervalSeconds':
        if (typeof value !== 'number' || !(value > 0)) {
          throw new SettingsError('samplingIntervalSeconds: expected a positive number')
        }
        result.samplingIntervalSeconds = value
        break
      case 'cycleRule':
        result.cycleRule = parseCycleRule(value)
        break
      case 'specificationFile':
        if (value !== null && typeof value !== 'string') {
          throw new SettingsError('specificationFile: expected a path or null')
        }
        result.specificationFile = value === null ? null : resolve(baseDir, value)
        break
      case 'outputExtension':
        if (typeof value !== 'string' || !/^\.[\w.-]+$/.test(value)) {
          throw new SettingsError('outputExtension: expected something like ".csv"')
        }
        result.outputExtension = value
        break
      default:
        throw new SettingsError(`Unknown setting "${key}"`)
    }
  }

  return result
}

/**
 * Store for converter settings.
 * Defaults are overlaid by a JSON config file, then by command-line flags.
 */
export class SettingsStore {
  settings: ConverterSettings = { ...DEFAULT_SETTINGS }
  /** Config file the current settings came from */
  sourcePath: string | null = null

  constructor() {
    makeAutoObservable(this)
  }

  get samplingIntervalMs(): number {
    return this.settings.samplingIntervalSeconds * 1000
  }

  get cycleBoundaryRule(): CycleBoundaryRule {
    const rule = this.settings.cycleRule
    switch (rule.type) {
      case 'fixed-length':
        return fixedLengthRule(rule.frames)
      case 'leading-command':
        return leadingCommandRule(rule.command)
      case 'repeated-command':
        return repeatedCommandRule()
    }
  }

  get serializerOptions(): SerializerOptions {
    return {
      delimiter: this.settings.delimiter,
      timestampLabel: this.settings.timestampLabel,
      formatTimestamp: createTimestampFormatter(this.settings.timeZone, this.settings.timestampStyle),
    }
  }

  loadFromFile(path: string): void {
    const absolute = resolve(path)
    let data: unknown
    try {
      data = JSON.parse(readFileSync(absolute, 'utf8'))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new SettingsError(`Cannot read config ${absolute}: ${reason}`)
    }

    let parsed: Partial<ConverterSettings>
    try {
      parsed = parseSettings(data, dirname(absolute))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new SettingsError(`${absolute}: ${reason}`)
    }

    this.settings = { ...this.settings, ...parsed }
    this.sourcePath = absolute
  }

  /** Apply overrides that were already validated (e.g. parsed CLI flags) */
  update(overrides: Partial<ConverterSettings>): void {
    this.settings = { ...this.settings, ...overrides }
  }

  reset(): void {
    this.settings = { ...DEFAULT_SETTINGS }
    this.sourcePath = null
  }
}
