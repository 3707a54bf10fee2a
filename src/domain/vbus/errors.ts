/**
 * Errors that abort a read or a file conversion.
 * Per-frame rejections are not errors; see FrameRejection.
 */

/** A read asked for more bytes than the reservoir holds */
export class TruncatedError extends RangeError {
  readonly requested: number
  readonly available: number

  constructor(requested: number, available: number) {
    super(`ByteReservoir: requested ${requested} bytes, ${available} remaining`)
    this.name = 'TruncatedError'
    this.requested = requested
    this.available = available
  }
}

/** The output sink threw; the conversion of this file stops */
export class SinkWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SinkWriteError'
  }
}

/** A row did not match the frozen column set of its device pair */
export class SchemaViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SchemaViolationError'
  }
}

export class SpecificationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SpecificationError'
  }
}
