import { TruncatedError } from './errors'

/**
 * Byte-level cursor over a recording.
 * Positions are absolute offsets into the recording, even after consumed
 * bytes have been compacted away by `append()`.
 */
export class ByteReservoir {
  private data: Uint8Array
  private _offset: number
  private _base: number
  private _closed: boolean

  /**
   * @param initial Bytes available up front
   * @param closed True when `initial` is the whole recording
   */
  constructor(initial: Uint8Array = new Uint8Array(0), closed = false) {
    this.data = initial
    this._offset = 0
    this._base = 0
    this._closed = closed
  }

  /** Absolute offset of the next unread byte */
  get position(): number {
    return this._base + this._offset
  }

  get remaining(): number {
    return this.data.length - this._offset
  }

  get hasMore(): boolean {
    return this._offset < this.data.length
  }

  /** No more bytes will be appended */
  get closed(): boolean {
    return this._closed
  }

  get eof(): boolean {
    return this._closed && !this.hasMore
  }

  append(chunk: Uint8Array): void {
    if (this._closed) {
      throw new Error('ByteReservoir: append after close')
    }
    if (chunk.length === 0) return

    const unread = this.data.subarray(this._offset)
    const next = new Uint8Array(unread.length + chunk.length)
    next.set(unread, 0)
    next.set(chunk, unread.length)

    this._base += this._offset
    this._offset = 0
    this.data = next
  }

  close(): void {
    this._closed = true
  }

  /**
   * Byte at `index` bytes past the cursor, or -1 beyond the available data.
   */
  peekByte(index = 0): number {
    const i = this._offset + index
    if (index < 0 || i >= this.data.length) {
      return -1
    }
    return this.data[i]
  }

  /**
   * View of the next n bytes without advancing. Valid until the next append.
   */
  peek(n: number): Uint8Array {
    if (n > this.remaining) {
      throw new TruncatedError(n, this.remaining)
    }
    return this.data.subarray(this._offset, this._offset + n)
  }

  consume(n: number): Uint8Array {
    const bytes = this.peek(n).slice()
    this._offset += n
    return bytes
  }

  /** Advance by up to n bytes. Returns how many were skipped. */
  skip(n: number): number {
    const count = Math.max(0, Math.min(n, this.remaining))
    this._offset += count
    return count
  }

  /**
   * Distance from the cursor to the next occurrence of `value`, or -1.
   */
  indexOf(value: number, from = 0): number {
    const i = this.data.indexOf(value, this._offset + from)
    return i < 0 ? -1 : i - this._offset
  }
}
