import { describe, it, expect } from 'vitest'
import { createTimestampFormatter, formatHex, formatScaled, isValidTimeZone, quoteCell } from './formatting'

describe('createTimestampFormatter', () => {
  const t = Date.UTC(2024, 4, 1, 13, 5, 0)

  it('defaults to UTC in ISO order', () => {
    expect(createTimestampFormatter()(t)).toBe('2024-05-01 13:05:00')
  })

  it('writes day-first dates', () => {
    expect(createTimestampFormatter('UTC', 'dmy')(t)).toBe('01.05.2024 13:05:00')
  })

  it('writes midnight as hour 00', () => {
    expect(createTimestampFormatter()(Date.UTC(2024, 4, 1))).toBe('2024-05-01 00:00:00')
  })

  it('converts to the requested zone, following daylight saving', () => {
    const berlin = createTimestampFormatter('Europe/Berlin')
    expect(berlin(Date.UTC(2024, 0, 15, 12, 0, 0))).toBe('2024-01-15 13:00:00')
    expect(berlin(Date.UTC(2024, 6, 1, 0, 30, 0))).toBe('2024-07-01 02:30:00')
  })
})

describe('isValidTimeZone', () => {
  it('accepts IANA zones and rejects anything else', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true)
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false)
  })
})

describe('cell formatting', () => {
  it('prints the fixed number of decimals', () => {
    expect(formatScaled(25, 1)).toBe('25.0')
    expect(formatScaled(-5.5, 1)).toBe('-5.5')
    expect(formatScaled(1234, 0)).toBe('1234')
  })

  it('prints payloads as contiguous lowercase hex', () => {
    expect(formatHex(Uint8Array.from([0xDE, 0xAD, 0x01]))).toBe('dead01')
  })

  it('quotes cells that would break the row', () => {
    expect(quoteCell('plain', ',')).toBe('plain')
    expect(quoteCell('a,b', ',')).toBe('"a,b"')
    expect(quoteCell('a,b', '\t')).toBe('a,b')
    expect(quoteCell('say "hi"', '\t')).toBe('"say ""hi"""')
  })
})
