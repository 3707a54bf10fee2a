import type { DeviceKey } from './types/Telegram'
import { SpecificationTable } from './spec/SpecificationTable'
import { encodePacket } from './vbus/frameEncoder'
import { SYNC_BYTE } from './vbus/types'

export const TEST_DEVICE: DeviceKey = { source: 0x0001, destination: 0x0002 }

export const MEASUREMENT_COMMAND = 0x0100
export const STATUS_COMMAND = 0x0200

/** 2024-05-01 00:00:00 UTC */
export const TEST_START = Date.UTC(2024, 4, 1)

export const TEST_SPECIFICATION_JSON = {
  packets: [
    {
      name: 'Test controller',
      source: 1,
      destination: 2,
      command: '0x0100',
      fields: [
        { id: 'speed', label: 'Speed', offset: 0, width: 2, scale: '0.1', unit: '%' },
        { id: 'temp', label: 'Temp', offset: 2, width: 2, signed: true, scale: '1/10', unit: '°C' },
      ],
    },
    {
      name: 'Test controller status',
      source: 1,
      destination: 2,
      command: '0x0200',
      fields: [
        { id: 'relay_mask', label: 'Relay mask', offset: 0, width: 1 },
      ],
    },
  ],
}

export function testSpecification(): SpecificationTable {
  return SpecificationTable.fromJson(TEST_SPECIFICATION_JSON)
}

/** Little-endian payload bytes for the measurement packet */
export function measurementPayload(speed: number, temp: number): Uint8Array {
  const payload = new Uint8Array(4)
  const view = new DataView(payload.buffer)
  view.setUint16(0, speed, true)
  view.setInt16(2, temp, true)
  return payload
}

export function measurementPacket(speed: number, temp: number, device: DeviceKey = TEST_DEVICE): Uint8Array {
  return encodePacket({ ...device, command: MEASUREMENT_COMMAND, payload: measurementPayload(speed, temp) })
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const p of parts) {
    out.set(p, at)
    at += p.length
  }
  return out
}

/**
 * Deterministic filler bytes that never contain the sync byte.
 */
export function noise(length: number, seed = 1): Uint8Array {
  const out = new Uint8Array(length)
  let state = seed
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0
    const b = (state >>> 16) & 0xFF
    out[i] = b === SYNC_BYTE ? 0x55 : b
  }
  return out
}

/**
 * Filler with a sync byte every `every` bytes. Each one is followed by a
 * byte with the high bit set, so none of them can start a valid header.
 */
export function noiseWithSyncs(length: number, seed = 1, every = 6): Uint8Array {
  const out = noise(length, seed)
  for (let i = 0; i < length; i += every) {
    out[i] = SYNC_BYTE
    if (i + 1 < length) out[i + 1] |= 0x80
  }
  return out
}
