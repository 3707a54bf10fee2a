/**
 * Builds VBus wire bytes: the inverse of FrameSynchronizer.
 *
 * Packet (0x10):   AA [dst LE16] [src LE16] 10 [cmd LE16] [frames] [crc] { [4 data] [septet] [crc] }*
 * Datagram (0x20): AA [dst LE16] [src LE16] 20 [cmd LE16] [6 data] [septet] [crc]
 * Telegram (0x30): AA [dst LE16] [src LE16] 30 [cmd] [crc] { [7 data] [septet] [crc] }*
 */
import { vbusChecksum } from './checksum'
import { encodeSeptetGroup } from './septet'
import { PROTOCOL, SYNC_BYTE } from './types'

export interface PacketInit {
  destination: number
  source: number
  command: number
  payload: Uint8Array
}

export interface DatagramInit {
  destination: number
  source: number
  command: number
  param16: number
  param32: number
}

export interface TelegramInit {
  destination: number
  source: number
  /** Command byte; bits 5-6 are overwritten with the frame count */
  command: number
  payload: Uint8Array
}

function writeAddresses(frame: Uint8Array, destination: number, source: number, version: number): void {
  frame[0] = SYNC_BYTE
  frame[1] = destination & 0x7F
  frame[2] = (destination >> 8) & 0x7F
  frame[3] = source & 0x7F
  frame[4] = (source >> 8) & 0x7F
  frame[5] = version
}

/**
 * Append septet groups for `payload` starting at frame[at].
 * A short final group is zero-padded.
 */
function writeGroups(frame: Uint8Array, at: number, payload: Uint8Array, groupLength: number): void {
  const groupCount = Math.ceil(payload.length / groupLength)
  for (let g = 0; g < groupCount; g++) {
    const base = at + g * (groupLength + 2)
    const { bytes, septet } = encodeSeptetGroup(payload, g * groupLength, groupLength)
    frame.set(bytes, base)
    frame[base + groupLength] = septet
    frame[base + groupLength + 1] = vbusChecksum(frame, base, base + groupLength + 1)
  }
}

/**
 * Encode a version 1.0 packet. The payload is padded to a multiple of 4.
 * Addresses and command must be 7-bit clean per byte, as on the bus.
 */
export function encodePacket(init: PacketInit): Uint8Array {
  const frameCount = Math.ceil(init.payload.length / 4)
  if (frameCount > 0x7F) {
    throw new RangeError(`Packet payload of ${init.payload.length} bytes exceeds 508`)
  }

  const frame = new Uint8Array(10 + frameCount * 6)
  writeAddresses(frame, init.destination, init.source, PROTOCOL.PACKET)
  frame[6] = init.command & 0x7F
  frame[7] = (init.command >> 8) & 0x7F
  frame[8] = frameCount
  frame[9] = vbusChecksum(frame, 1, 9)

  writeGroups(frame, 10, init.payload, 4)
  return frame
}

export function encodeDatagram(init: DatagramInit): Uint8Array {
  const data = new Uint8Array(6)
  const view = new DataView(data.buffer)
  view.setInt16(0, init.param16, true)
  view.setInt32(2, init.param32, true)

  const frame = new Uint8Array(16)
  writeAddresses(frame, init.destination, init.source, PROTOCOL.DATAGRAM)
  frame[6] = init.command & 0x7F
  frame[7] = (init.command >> 8) & 0x7F

  const { bytes, septet } = encodeSeptetGroup(data, 0, 6)
  frame.set(bytes, 8)
  frame[14] = septet
  frame[15] = vbusChecksum(frame, 1, 15)
  return frame
}

/**
 * Encode a version 3.0 telegram. Payload is padded to a multiple of 7,
 * at most 3 groups.
 */
export function encodeTelegram(init: TelegramInit): Uint8Array {
  const frameCount = Math.ceil(init.payload.length / 7)
  if (frameCount > 3) {
    throw new RangeError(`Telegram payload of ${init.payload.length} bytes exceeds 21`)
  }

  const frame = new Uint8Array(8 + frameCount * 9)
  writeAddresses(frame, init.destination, init.source, PROTOCOL.TELEGRAM)
  frame[6] = (init.command & 0x1F) | (frameCount << 5)
  frame[7] = vbusChecksum(frame, 1, 7)

  writeGroups(frame, 8, init.payload, 7)
  return frame
}
