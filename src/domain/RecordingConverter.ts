/**
 * RecordingConverter - one decode session for one recording file.
 *
 * Flow: reservoir → synchronizer → resolver → assembler → serializer per device pair
 *
 * A session owns all of its state; abandoning it mid-file is always safe.
 * Corrupt frames never end a session. Only a sink failure or a schema
 * violation does, and both are thrown to the caller.
 */
import type {
  ConversionSummary,
  DeviceKey,
  Frame,
  FrameRejection,
  Schema,
} from './types/Telegram'
import { ByteReservoir } from './vbus/ByteReservoir'
import { FrameSynchronizer } from './vbus/FrameSynchronizer'
import { PROTOCOL } from './vbus/types'
import { SinkWriteError } from './vbus/errors'
import { FieldResolver } from './spec/FieldResolver'
import { SpecificationTable, describePacket } from './spec/SpecificationTable'
import { type CompletedRecord, RecordAssembler, deviceId } from './records/RecordAssembler'
import type { CycleBoundaryRule } from './records/cycleRules'
import { type SerializerOptions, TabularSerializer } from './export/TabularSerializer'
import type { RowSink } from './export/sinks'

export interface ConverterOptions {
  specification: SpecificationTable
  /** Timestamp of the first sampling cycle, milliseconds since the epoch */
  startTimestamp: number
  samplingIntervalMs: number
  cycleRule?: CycleBoundaryRule
  /** Called once per device pair, right before its first row */
  sinkFor: (device: DeviceKey, schema: Schema) => RowSink
  serializer?: SerializerOptions
  /** Records outside [minTimestamp, maxTimestamp] are not written */
  minTimestamp?: number
  maxTimestamp?: number
  /** Sees every valid frame, including datagrams and telegrams */
  onFrame?: (frame: Frame) => void
}

export type ProgressCallback = (progress: number, message: string) => void

const PROGRESS_CHUNK_SIZE = 64 * 1024

function emptyRejections(): Record<FrameRejection, number> {
  return {
    ChecksumMismatch: 0,
    MalformedSeptetGroup: 0,
    HeaderLengthMismatch: 0,
    UnknownProtocolVersion: 0,
  }
}

export class RecordingConverter {
  private readonly options: ConverterOptions
  private readonly reservoir = new ByteReservoir()
  private readonly synchronizer: FrameSynchronizer
  private readonly resolver: FieldResolver
  private readonly assembler: RecordAssembler
  private readonly serializers = new Map<string, TabularSerializer>()
  private readonly reportedUnrecognized = new Set<string>()

  private readonly rejections = emptyRejections()
  private framesSeen = 0
  private framesUnrecognized = 0
  private framesOtherProtocol = 0
  private recordsEmitted = 0
  private recordsOutsideWindow = 0
  private truncatedAt: number | null = null

  private ended = false
  private failure: Error | null = null

  constructor(options: ConverterOptions) {
    this.options = options
    this.synchronizer = new FrameSynchronizer(this.reservoir)
    this.resolver = new FieldResolver(options.specification)
    this.assembler = new RecordAssembler({
      startTimestamp: options.startTimestamp,
      samplingIntervalMs: options.samplingIntervalMs,
      cycleRule: options.cycleRule,
    })
  }

  /** Absolute offset up to which input has been decoded */
  get position(): number {
    return this.reservoir.position
  }

  get summary(): ConversionSummary {
    return {
      framesSeen: this.framesSeen,
      framesRejected: this.synchronizer.corruptionCount,
      rejections: { ...this.rejections },
      framesUnrecognized: this.framesUnrecognized,
      framesOtherProtocol: this.framesOtherProtocol,
      bytesSkipped: this.synchronizer.bytesSkipped,
      recordsEmitted: this.recordsEmitted,
      recordsOutsideWindow: this.recordsOutsideWindow,
      fieldsOutsideSchema: this.assembler.fieldsOutsideSchema,
      truncated: this.truncatedAt !== null,
      truncatedAt: this.truncatedAt,
      devices: Array.from(this.serializers.values(), s => ({
        device: s.schema.device,
        name: s.schema.name,
        columns: s.schema.columns.length,
        rows: s.rowsWritten,
      })),
    }
  }

  write(chunk: Uint8Array): void {
    this.assertWritable()
    this.reservoir.append(chunk)
    this.guard(() => this.drain())
  }

  /**
   * Mark the end of the recording, flush open cycles and return the summary.
   */
  end(): ConversionSummary {
    this.assertWritable()
    this.ended = true
    this.reservoir.close()
    this.guard(() => {
      this.drain()
      this.emit(this.assembler.flush())
    })

    const summary = this.summary
    if (summary.framesRejected > 0) {
      console.warn(`VBus decoder: ${summary.framesRejected} frames failed validation and were skipped`)
    }
    if (summary.truncatedAt !== null) {
      console.warn(`VBus decoder: recording ends inside a frame at offset ${summary.truncatedAt}`)
    }
    return summary
  }

  private assertWritable(): void {
    if (this.failure) {
      throw new Error(`Conversion session aborted: ${this.failure.message}`)
    }
    if (this.ended) {
      throw new Error('Conversion session already ended')
    }
  }

  private guard(step: () => void): void {
    try {
      step()
    } catch (err) {
      this.failure = err instanceof Error ? err : new Error(String(err))
      throw err
    }
  }

  private drain(): void {
    for (;;) {
      const event = this.synchronizer.next()
      switch (event.kind) {
        case 'frame':
          this.handleFrame(event.frame)
          break
        case 'rejected':
          this.rejections[event.reason]++
          break
        case 'truncated':
          this.truncatedAt = event.offset
          break
        case 'need-more':
        case 'end':
          return
      }
    }
  }

  private handleFrame(frame: Frame): void {
    this.framesSeen++
    this.options.onFrame?.(frame)

    if (frame.protocolVersion !== PROTOCOL.PACKET) {
      this.framesOtherProtocol++
      return
    }

    const resolved = this.resolver.resolve(frame)
    if (!resolved.specification) {
      this.framesUnrecognized++
      const tag = describePacket(frame)
      if (!this.reportedUnrecognized.has(tag)) {
        this.reportedUnrecognized.add(tag)
        console.warn(`VBus decoder: no specification for ${tag}, keeping raw payload`)
      }
    }

    this.emit(this.assembler.push(resolved))
  }

  private emit(completed: CompletedRecord[]): void {
    const { minTimestamp, maxTimestamp } = this.options

    for (const { record, schema } of completed) {
      if ((minTimestamp !== undefined && record.timestamp < minTimestamp)
        || (maxTimestamp !== undefined && record.timestamp > maxTimestamp)) {
        this.recordsOutsideWindow++
        continue
      }

      this.serializerFor(schema).writeRecord(record)
      this.recordsEmitted++
    }
  }

  private serializerFor(schema: Schema): TabularSerializer {
    const id = deviceId(schema.device)
    let serializer = this.serializers.get(id)
    if (!serializer) {
      let sink: RowSink
      try {
        sink = this.options.sinkFor(schema.device, schema)
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        throw new SinkWriteError(`No sink for device ${id}: ${reason}`, { cause: err })
      }
      serializer = new TabularSerializer(schema, sink, this.options.serializer)
      this.serializers.set(id, serializer)
    }
    return serializer
  }
}

/**
 * Convert a complete recording held in memory.
 *
 * @param buffer Raw recording bytes
 * @param onProgress Optional progress callback (0-100)
 */
export function convertRecording(
  buffer: Uint8Array,
  options: ConverterOptions,
  onProgress?: ProgressCallback,
): ConversionSummary {
  const report = (pct: number, msg: string) => {
    if (onProgress) onProgress(pct, msg)
  }

  report(0, 'Decoding frames...')
  const converter = new RecordingConverter(options)

  let lastProgressReport = 0
  for (let offset = 0; offset < buffer.length; offset += PROGRESS_CHUNK_SIZE) {
    const end = Math.min(offset + PROGRESS_CHUNK_SIZE, buffer.length)
    converter.write(buffer.subarray(offset, end))

    const progress = Math.floor((end / buffer.length) * 90)
    if (progress >= lastProgressReport + 5) {
      lastProgressReport = progress
      report(progress, 'Decoding frames...')
    }
  }

  report(95, 'Flushing records...')
  const summary = converter.end()

  report(100, 'Complete!')
  return summary
}
