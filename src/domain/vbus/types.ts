/**
 * VBus wire constants - sync byte, protocol versions and their frame layouts.
 */

export const SYNC_BYTE = 0xAA

/** Protocol version byte values */
export const PROTOCOL = {
  PACKET: 0x10,
  DATAGRAM: 0x20,
  TELEGRAM: 0x30,
} as const

export type ProtocolVersion = typeof PROTOCOL[keyof typeof PROTOCOL]

/** Offset of the version byte, identical across all protocol versions */
export const VERSION_OFFSET = 5

/**
 * Static frame shape of one protocol version.
 *
 * Every version shares: sync, destination (2), source (2), version.
 * What follows differs per version and is described here.
 */
export interface FrameLayout {
  version: ProtocolVersion
  /** Header length including sync and header checksum */
  headerLength: number
  /** Data bytes carried by each septet group */
  groupDataLength: number
  /** Septet-encoded data inside the header itself (datagrams only) */
  headerDataOffset: number
  headerDataLength: number
}

export const FRAME_LAYOUTS: ReadonlyMap<number, FrameLayout> = new Map<number, FrameLayout>([
  [PROTOCOL.PACKET, {
    version: PROTOCOL.PACKET,
    headerLength: 10,
    groupDataLength: 4,
    headerDataOffset: 0,
    headerDataLength: 0,
  }],
  [PROTOCOL.DATAGRAM, {
    version: PROTOCOL.DATAGRAM,
    headerLength: 16,
    groupDataLength: 0,
    headerDataOffset: 8,
    headerDataLength: 6,
  }],
  [PROTOCOL.TELEGRAM, {
    version: PROTOCOL.TELEGRAM,
    headerLength: 8,
    groupDataLength: 7,
    headerDataOffset: 0,
    headerDataLength: 0,
  }],
])

/** Wire length of one septet group: data bytes, septet, checksum */
export function groupWireLength(layout: FrameLayout): number {
  return layout.groupDataLength + 2
}
