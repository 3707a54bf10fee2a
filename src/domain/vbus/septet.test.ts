import { describe, it, expect } from 'vitest'
import { decodeSeptetGroup, encodeSeptetGroup } from './septet'

describe('septet coding', () => {
  it('moves high bits into the septet', () => {
    const { bytes, septet } = encodeSeptetGroup(Uint8Array.from([0x80, 0x01, 0xFF, 0x7F]), 0, 4)
    expect(Array.from(bytes)).toEqual([0x00, 0x01, 0x7F, 0x7F])
    expect(septet).toBe(0b0101)
  })

  it('zero-pads past the end of the data', () => {
    const { bytes, septet } = encodeSeptetGroup(Uint8Array.from([0x90]), 0, 4)
    expect(Array.from(bytes)).toEqual([0x10, 0x00, 0x00, 0x00])
    expect(septet).toBe(0b0001)
  })

  it('refuses groups longer than 7 bytes', () => {
    expect(() => encodeSeptetGroup(new Uint8Array(8), 0, 8)).toThrow(RangeError)
  })

  it('restores the original bytes', () => {
    const wire = Uint8Array.from([0x00, 0x01, 0x7F, 0x7F])
    const target = new Uint8Array(6)
    expect(decodeSeptetGroup(wire, 0, 4, 0b0101, target, 2)).toBe(true)
    expect(Array.from(target)).toEqual([0, 0, 0x80, 0x01, 0xFF, 0x7F])
  })

  it('rejects septet bits beyond the group length', () => {
    const target = new Uint8Array(4)
    expect(decodeSeptetGroup(new Uint8Array(4), 0, 4, 0b10000, target, 0)).toBe(false)
  })

  it('rejects a septet with its high bit set', () => {
    const target = new Uint8Array(7)
    expect(decodeSeptetGroup(new Uint8Array(7), 0, 7, 0x80, target, 0)).toBe(false)
  })

  it('rejects a data byte with its high bit set', () => {
    const target = new Uint8Array(4)
    expect(decodeSeptetGroup(Uint8Array.from([0x00, 0x81, 0x00, 0x00]), 0, 4, 0, target, 0)).toBe(false)
  })
})
