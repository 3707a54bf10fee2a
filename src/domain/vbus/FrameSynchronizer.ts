/**
 * FrameSynchronizer - finds, validates and septet-decodes VBus frames.
 *
 * Scans for the sync byte, checks the header, then every septet group.
 * Any failure discards exactly one byte (the sync byte) and scanning resumes
 * from the next position, so a corrupted region can never stall the decoder.
 * All bytes after a sync byte are 7-bit clean; a high-bit byte inside a
 * candidate frame means that frame was cut short by the next sync.
 */
import type { Frame, FrameRejection } from '../types/Telegram'
import { ByteReservoir } from './ByteReservoir'
import { hasValidChecksum } from './checksum'
import { decodeSeptetGroup } from './septet'
import {
  type FrameLayout,
  FRAME_LAYOUTS,
  PROTOCOL,
  SYNC_BYTE,
  VERSION_OFFSET,
  groupWireLength,
} from './types'

export type SyncEvent =
  | { kind: 'frame'; frame: Frame }
  | { kind: 'rejected'; reason: FrameRejection; offset: number }
  /** Recording ended inside a frame; nothing after `offset` is usable */
  | { kind: 'truncated'; offset: number }
  /** Reservoir is still open and the frame at the cursor is incomplete */
  | { kind: 'need-more' }
  | { kind: 'end' }

type ParseOutcome =
  | { kind: 'frame'; frame: Frame }
  | { kind: 'rejected'; reason: FrameRejection }
  | { kind: 'incomplete' }

type ScanResult = 'clean' | 'dirty' | 'short'

const INCOMPLETE: ParseOutcome = { kind: 'incomplete' }

function reject(reason: FrameRejection): ParseOutcome {
  return { kind: 'rejected', reason }
}

export class FrameSynchronizer {
  private readonly reservoir: ByteReservoir
  private _corruptionCount = 0
  private _bytesSkipped = 0

  constructor(reservoir: ByteReservoir) {
    this.reservoir = reservoir
  }

  /** Sync bytes that did not start a valid frame */
  get corruptionCount(): number {
    return this._corruptionCount
  }

  /** Bytes passed over while hunting for a sync byte */
  get bytesSkipped(): number {
    return this._bytesSkipped
  }

  next(): SyncEvent {
    const reservoir = this.reservoir

    const syncIndex = reservoir.indexOf(SYNC_BYTE)
    if (syncIndex < 0) {
      this._bytesSkipped += reservoir.skip(reservoir.remaining)
      return reservoir.closed ? { kind: 'end' } : { kind: 'need-more' }
    }
    this._bytesSkipped += reservoir.skip(syncIndex)

    const offset = reservoir.position
    const outcome = parseFrameAtCursor(reservoir, offset)

    switch (outcome.kind) {
      case 'frame':
        reservoir.skip(outcome.frame.length)
        return outcome

      case 'rejected':
        reservoir.skip(1)
        this._corruptionCount++
        return { kind: 'rejected', reason: outcome.reason, offset }

      case 'incomplete':
        if (!reservoir.closed) {
          return { kind: 'need-more' }
        }
        reservoir.skip(reservoir.remaining)
        return { kind: 'truncated', offset }
    }
  }
}

/**
 * Check reservoir bytes [from, to) past the cursor for the 7-bit rule.
 * A dirty byte wins over running out of data: it proves the frame is broken.
 */
function scanClean(reservoir: ByteReservoir, from: number, to: number): ScanResult {
  for (let i = from; i < to; i++) {
    const b = reservoir.peekByte(i)
    if (b < 0) return 'short'
    if (b & 0x80) return 'dirty'
  }
  return 'clean'
}

function frameCountOf(layout: FrameLayout, header: Uint8Array): number {
  switch (layout.version) {
    case PROTOCOL.PACKET:
      return header[8]
    case PROTOCOL.TELEGRAM:
      return (header[6] >> 5) & 0x03
    default:
      return 0
  }
}

function commandOf(layout: FrameLayout, header: Uint8Array): number {
  if (layout.version === PROTOCOL.TELEGRAM) {
    return header[6] & 0x1F
  }
  return header[6] | (header[7] << 8)
}

/**
 * Parse the frame whose sync byte sits at the reservoir cursor.
 */
function parseFrameAtCursor(reservoir: ByteReservoir, offset: number): ParseOutcome {
  const lead = scanClean(reservoir, 1, VERSION_OFFSET + 1)
  if (lead === 'dirty') return reject('HeaderLengthMismatch')
  if (lead === 'short') return INCOMPLETE

  const layout = FRAME_LAYOUTS.get(reservoir.peekByte(VERSION_OFFSET))
  if (!layout) return reject('UnknownProtocolVersion')

  const rest = scanClean(reservoir, VERSION_OFFSET + 1, layout.headerLength)
  if (rest === 'dirty') return reject('HeaderLengthMismatch')
  if (rest === 'short') return INCOMPLETE

  const header = reservoir.peek(layout.headerLength)
  const checksumIndex = layout.headerLength - 1
  if (!hasValidChecksum(header, 1, checksumIndex)) {
    return reject('ChecksumMismatch')
  }

  const groupCount = frameCountOf(layout, header)
  const groupLength = groupWireLength(layout)
  const totalLength = layout.headerLength + groupCount * groupLength

  const body = scanClean(reservoir, layout.headerLength, totalLength)
  if (body === 'dirty') return reject('MalformedSeptetGroup')
  if (body === 'short') return INCOMPLETE

  const wire = reservoir.peek(totalLength)
  const payload = new Uint8Array(layout.headerDataLength + groupCount * layout.groupDataLength)

  if (layout.headerDataLength > 0) {
    const septet = wire[layout.headerDataOffset + layout.headerDataLength]
    const ok = decodeSeptetGroup(
      wire, layout.headerDataOffset, layout.headerDataLength, septet, payload, 0,
    )
    if (!ok) return reject('MalformedSeptetGroup')
  }

  for (let g = 0; g < groupCount; g++) {
    const base = layout.headerLength + g * groupLength
    const septetIndex = base + layout.groupDataLength

    if (!hasValidChecksum(wire, base, septetIndex + 1)) {
      return reject('ChecksumMismatch')
    }

    const ok = decodeSeptetGroup(
      wire, base, layout.groupDataLength, wire[septetIndex],
      payload, layout.headerDataLength + g * layout.groupDataLength,
    )
    if (!ok) return reject('MalformedSeptetGroup')
  }

  return {
    kind: 'frame',
    frame: {
      destination: wire[1] | (wire[2] << 8),
      source: wire[3] | (wire[4] << 8),
      protocolVersion: layout.version,
      command: commandOf(layout, wire),
      payload,
      offset,
      length: totalLength,
    },
  }
}
