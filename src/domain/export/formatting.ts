/**
 * Cell and timestamp formatting for tabular output.
 * Decimal separator is always '.', independent of locale.
 */

export type TimestampStyle = 'iso' | 'dmy'

export type TimestampFormatter = (timestamp: number) => string

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone })
    return true
  } catch {
    return false
  }
}

/**
 * Formatter for epoch milliseconds in `timeZone`:
 *   iso -> "2024-05-01 13:05:00"
 *   dmy -> "01.05.2024 13:05:00"
 */
export function createTimestampFormatter(timeZone = 'UTC', style: TimestampStyle = 'iso'): TimestampFormatter {
  const format = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  })

  return (timestamp) => {
    const parts: Record<string, string> = {}
    for (const part of format.formatToParts(new Date(timestamp))) {
      parts[part.type] = part.value
    }
    const time = `${parts.hour}:${parts.minute}:${parts.second}`
    return style === 'dmy'
      ? `${parts.day}.${parts.month}.${parts.year} ${time}`
      : `${parts.year}-${parts.month}-${parts.day} ${time}`
  }
}

export function formatScaled(value: number, decimals: number): string {
  return value.toFixed(decimals)
}

export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('')
}

/**
 * Quote a cell CSV-style when it contains the delimiter, a quote or a line break.
 */
export function quoteCell(text: string, delimiter: string): string {
  if (text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}
