/* ---- VBus checksum ---- */

/**
 * 7-bit additive checksum with complement: 0x7F minus the byte sum, mod 128.
 * Covers data[start..end).
 */
export function vbusChecksum(data: Uint8Array, start = 0, end = data.length): number {
  let crc = 0x7F
  for (let i = start; i < end; i++) {
    crc = (crc - data[i]) & 0x7F
  }
  return crc
}

/**
 * True when the byte at `end` equals the checksum of data[start..end).
 */
export function hasValidChecksum(data: Uint8Array, start: number, end: number): boolean {
  return end < data.length && data[end] === vbusChecksum(data, start, end)
}
