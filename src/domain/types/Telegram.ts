/**
 * Core data model shared by the decoder, resolver, assembler and serializer.
 * All addresses and commands are the 16-bit values as transmitted on the bus.
 */

/**
 * A validated, septet-decoded frame.
 * `payload.length` always equals the length implied by the header.
 */
export interface Frame {
  destination: number
  source: number
  /** 0x10 packet, 0x20 datagram, 0x30 telegram */
  protocolVersion: number
  /** Telegram commands are the low 5 bits; the frame count is not part of it */
  command: number
  payload: Uint8Array
  /** Absolute offset of the sync byte in the recording */
  offset: number
  /** Number of wire bytes the frame occupied, sync byte included */
  length: number
}

/** Exact fraction, so precision can be derived from the step size */
export interface Rational {
  numerator: number
  denominator: number
}

export type ByteWidth = 1 | 2 | 3 | 4

/**
 * Layout of one value inside a packet payload.
 * Immutable once loaded into a specification table.
 */
export interface FieldDescriptor {
  /** Unique within its packet */
  id: string
  label: string
  byteOffset: number
  byteWidth: ByteWidth
  signed: boolean
  scale: Rational
  unit: string
  /** Decimal digits needed to print every multiple of `scale` exactly */
  decimals: number
}

export interface PacketSpecification {
  name: string
  source: number
  destination: number
  command: number
  fields: readonly FieldDescriptor[]
}

export interface ResolvedField {
  /** Column key, unique per device pair: `<command>/<field id>` */
  key: string
  label: string
  unit: string
  rawValue: number
  scaledValue: number
  decimals: number
}

export interface ResolvedFrame {
  frame: Frame
  /** Undefined when the command is missing from the specification table */
  specification: PacketSpecification | undefined
  fields: ResolvedField[]
  /** Descriptors that did not fit the payload (older firmware) */
  skippedDescriptors: number
}

/** The (source, destination) address pair a record belongs to */
export interface DeviceKey {
  source: number
  destination: number
}

export type ColumnKind = 'value' | 'payload'

export interface Column {
  key: string
  label: string
  unit: string
  decimals: number
  kind: ColumnKind
}

/** Frozen, ordered column set of one device pair within one file */
export interface Schema {
  device: DeviceKey
  /** Name of the first recognized packet for this pair, if any */
  name: string | undefined
  columns: readonly Column[]
}

export type Cell =
  | { kind: 'value'; field: ResolvedField }
  | { kind: 'payload'; command: number; payload: Uint8Array }

export interface AssembledRecord {
  device: DeviceKey
  /** Milliseconds since the Unix epoch */
  timestamp: number
  /** Zero-based sampling cycle within the device pair */
  cycle: number
  /** Aligned with `schema.columns`; null is an empty cell */
  cells: (Cell | null)[]
}

export type FrameRejection =
  | 'ChecksumMismatch'
  | 'MalformedSeptetGroup'
  | 'HeaderLengthMismatch'
  | 'UnknownProtocolVersion'

export interface DeviceSummary {
  device: DeviceKey
  name: string | undefined
  columns: number
  rows: number
}

/**
 * Per-file outcome. Always produced, even when frames were corrupt.
 */
export interface ConversionSummary {
  /** Valid frames of any protocol version */
  framesSeen: number
  framesRejected: number
  rejections: Record<FrameRejection, number>
  framesUnrecognized: number
  framesOtherProtocol: number
  bytesSkipped: number
  recordsEmitted: number
  recordsOutsideWindow: number
  fieldsOutsideSchema: number
  truncated: boolean
  /** Offset of the sync byte whose frame was cut off */
  truncatedAt: number | null
  devices: DeviceSummary[]
}
