/**
 * Septet coding: every transmitted byte after the sync byte is 7-bit clean.
 * The high bits of a group of data bytes travel in one extra "septet" byte,
 * bit k of the septet holding bit 7 of the group's k-th byte.
 */

/**
 * Restore `length` payload bytes from wire[start..start+length) and `septet`,
 * writing them to target[targetOffset..].
 *
 * Returns false for a malformed group: a data or septet byte with its high
 * bit set, or septet bits beyond the group length.
 */
export function decodeSeptetGroup(
  wire: Uint8Array,
  start: number,
  length: number,
  septet: number,
  target: Uint8Array,
  targetOffset: number,
): boolean {
  if (septet & 0x80) return false
  if (septet >> length) return false

  for (let k = 0; k < length; k++) {
    const b = wire[start + k]
    if (b & 0x80) return false
    target[targetOffset + k] = (b & 0x7F) | (((septet >> k) & 0x01) << 7)
  }

  return true
}

/**
 * Split data[start..start+length) into 7-bit bytes plus their septet.
 * `length` must be 7 or less.
 */
export function encodeSeptetGroup(
  data: Uint8Array,
  start: number,
  length: number,
): { bytes: Uint8Array; septet: number } {
  if (length > 7) {
    throw new RangeError(`Septet group of ${length} bytes exceeds 7`)
  }

  const bytes = new Uint8Array(length)
  let septet = 0
  for (let k = 0; k < length; k++) {
    const b = data[start + k] ?? 0
    bytes[k] = b & 0x7F
    if (b & 0x80) {
      septet |= 1 << k
    }
  }

  return { bytes, septet }
}
