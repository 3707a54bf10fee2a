/**
 * Recording files are named after the day they cover: "20240501.vbus",
 * "20240501_packets.vbus". These helpers turn that datecode into the
 * session start timestamp.
 */

const DATECODE_PATTERN = /^(\d{4})(\d{2})(\d{2})/

export interface Datecode {
  year: number
  month: number
  day: number
}

/**
 * Leading YYYYMMDD of a file's base name, or null when absent or not a real date.
 */
export function datecodeFromFilename(filename: string): Datecode | null {
  const base = filename.split(/[\\/]/).pop() ?? filename
  const match = base.match(DATECODE_PATTERN)
  if (!match) return null

  const year = parseInt(match[1], 10)
  const month = parseInt(match[2], 10)
  const day = parseInt(match[3], 10)

  const check = new Date(Date.UTC(year, month - 1, day))
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null
  }

  return { year, month, day }
}

/** Offset of `timeZone` from UTC at instant `t`, in milliseconds */
function zoneOffset(t: number, timeZone: string): number {
  const parts: Record<string, number> = {}
  const format = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  })
  for (const part of format.formatToParts(new Date(t))) {
    if (part.type !== 'literal') {
      parts[part.type] = parseInt(part.value, 10)
    }
  }
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second)
  return asUtc - Math.floor(t / 1000) * 1000
}

/**
 * Midnight at the start of `date` in `timeZone`, as epoch milliseconds.
 */
export function startOfDay(date: Datecode, timeZone = 'UTC'): number {
  const guess = Date.UTC(date.year, date.month - 1, date.day)
  let t = guess - zoneOffset(guess, timeZone)
  // Second pass lands on the right side of a DST change near midnight
  t = guess - zoneOffset(t, timeZone)
  return t
}

export interface DayWindow {
  start: number
  /** Last millisecond of the day */
  end: number
}

/** The whole of `date` in `timeZone`; 23 or 25 hours across a DST change */
export function dayWindow(date: Datecode, timeZone = 'UTC'): DayWindow {
  const next = new Date(Date.UTC(date.year, date.month - 1, date.day + 1))
  const following = { year: next.getUTCFullYear(), month: next.getUTCMonth() + 1, day: next.getUTCDate() }
  return { start: startOfDay(date, timeZone), end: startOfDay(following, timeZone) - 1 }
}
