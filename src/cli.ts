/**
 * vbus-convert - turn VBus recordings into one table per device pair.
 */
import { reaction } from 'mobx'
import { existsSync } from 'node:fs'
import { basename, resolve } from 'node:path'
import { RootStore } from './stores/RootStore'
import {
  CONFIG_FILENAME,
  type ConverterSettings,
  SettingsError,
  parseDelimiter,
} from './stores/SettingsStore'
import type { FileConversion } from './stores/ConversionStore'
import { isValidTimeZone } from './domain/export/formatting'

const VALUE_FLAGS = new Set(['--out', '--config', '--start', '--interval', '--tz', '--delimiter', '--style'])

export interface CliArguments {
  files: string[]
  values: Map<string, string>
  help: boolean
}

export function parseArguments(argv: string[]): CliArguments {
  const files: string[] = []
  const values = new Map<string, string>()
  let help = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--help' || arg === '-h') {
      help = true
    } else if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--')) {
        throw new SettingsError(`${arg} needs a value`)
      }
      values.set(arg, value)
      i++
    } else if (arg.startsWith('--')) {
      throw new SettingsError(`Unknown option ${arg}`)
    } else {
      files.push(arg)
    }
  }

  return { files, values, help }
}

/** Settings given as flags, validated the same way as the config file */
export function settingsFromArguments(values: Map<string, string>): Partial<ConverterSettings> {
  const overrides: Partial<ConverterSettings> = {}

  const interval = values.get('--interval')
  if (interval !== undefined) {
    const seconds = Number(interval)
    if (!(seconds > 0)) throw new SettingsError(`--interval: expected a positive number, got "${interval}"`)
    overrides.samplingIntervalSeconds = seconds
  }

  const timeZone = values.get('--tz')
  if (timeZone !== undefined) {
    if (!isValidTimeZone(timeZone)) throw new SettingsError(`--tz: unknown time zone "${timeZone}"`)
    overrides.timeZone = timeZone
  }

  const delimiter = values.get('--delimiter')
  if (delimiter !== undefined) overrides.delimiter = parseDelimiter(delimiter)

  const style = values.get('--style')
  if (style !== undefined) {
    if (style !== 'iso' && style !== 'dmy') throw new SettingsError('--style: expected "iso" or "dmy"')
    overrides.timestampStyle = style
  }

  return overrides
}

export function parseStart(value: string): number {
  const timestamp = Date.parse(value)
  if (Number.isNaN(timestamp)) {
    throw new SettingsError(`--start: cannot parse "${value}" as a date`)
  }
  return timestamp
}

function usage(): string {
  return `vbus-convert <file...> [options]

Options:
  --out <dir>          Output directory (default: current directory)
  --config <path>      Settings file (default: ./${CONFIG_FILENAME} when present)
  --start <iso date>   Start of the first sampling cycle (default: datecode in the file name)
  --interval <s>       Seconds between sampling cycles
  --tz <zone>          Time zone for the timestamp column
  --delimiter <d>      tab, comma or semicolon
  --style <s>          Timestamp style: iso or dmy
  --help               Show this help
`
}

function describe(conversion: FileConversion): string[] {
  const name = basename(conversion.path)
  if (conversion.status === 'error' || !conversion.summary) {
    return [`${name}: failed - ${conversion.error ?? 'unknown error'}`]
  }

  const s = conversion.summary
  const lines = [
    `${name}: ${s.recordsEmitted} records, ${s.framesSeen} frames`
      + ` (${s.framesRejected} rejected, ${s.framesUnrecognized} unrecognized, ${s.bytesSkipped} bytes skipped)`,
  ]
  if (s.recordsOutsideWindow > 0) lines.push(`  ${s.recordsOutsideWindow} records past the end of the day left out`)
  if (s.truncated) lines.push(`  truncated at offset ${s.truncatedAt}`)
  for (const output of conversion.outputs) lines.push(`  -> ${output}`)
  return lines
}

export async function main(argv: string[]): Promise<number> {
  const store = new RootStore()

  let args: CliArguments
  let startTimestamp: number | undefined
  try {
    args = parseArguments(argv)
    if (args.help || args.files.length === 0) {
      console.log(usage())
      return args.help ? 0 : 1
    }

    const configPath = args.values.get('--config')
      ?? (existsSync(CONFIG_FILENAME) ? CONFIG_FILENAME : undefined)
    if (configPath) store.settingsStore.loadFromFile(configPath)

    store.settingsStore.update(settingsFromArguments(args.values))

    const start = args.values.get('--start')
    if (start !== undefined) startTimestamp = parseStart(start)
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err))
    return 1
  }

  const dispose = reaction(
    () => store.conversionStore.lastProgress,
    (event) => {
      if (event) console.log(`${basename(event.path)}: ${event.progress}% ${event.message}`)
    },
  )

  try {
    const results = await store.conversionStore.convertAll(args.files, {
      outDir: resolve(args.values.get('--out') ?? '.'),
      startTimestamp,
    })
    for (const conversion of results) {
      for (const line of describe(conversion)) console.log(line)
    }
  } finally {
    dispose()
  }

  return store.conversionStore.failedCount > 0 ? 1 : 0
}
