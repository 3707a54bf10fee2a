/**
 * TabularSerializer - writes the records of one device pair as delimited rows.
 *
 * One header row (timestamp column, then `label [unit]` per column), then one
 * row per record in arrival order. Rows are only ever appended.
 */
import type { AssembledRecord, Cell, Column, Schema } from '../types/Telegram'
import { SchemaViolationError, SinkWriteError } from '../vbus/errors'
import {
  type TimestampFormatter,
  createTimestampFormatter,
  formatHex,
  formatScaled,
  quoteCell,
} from './formatting'
import type { RowSink } from './sinks'

export interface SerializerOptions {
  /** Default: tab */
  delimiter?: string
  /** Default: "Timestamp" */
  timestampLabel?: string
  /** Default: UTC, iso style */
  formatTimestamp?: TimestampFormatter
  /** The sink already holds the header and earlier rows */
  resume?: boolean
}

export const DEFAULT_DELIMITER = '\t'
export const DEFAULT_TIMESTAMP_LABEL = 'Timestamp'

export function headerLabel(column: Column): string {
  return column.unit ? `${column.label} [${column.unit}]` : column.label
}

export function formatCell(cell: Cell | null): string {
  if (!cell) return ''
  if (cell.kind === 'payload') return formatHex(cell.payload)
  return formatScaled(cell.field.scaledValue, cell.field.decimals)
}

export class TabularSerializer {
  readonly schema: Schema
  private readonly sink: RowSink
  private readonly delimiter: string
  private readonly timestampLabel: string
  private readonly formatTimestamp: TimestampFormatter
  private headerWritten: boolean
  private _rowsWritten = 0

  constructor(schema: Schema, sink: RowSink, options: SerializerOptions = {}) {
    this.schema = schema
    this.sink = sink
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER
    this.timestampLabel = options.timestampLabel ?? DEFAULT_TIMESTAMP_LABEL
    this.formatTimestamp = options.formatTimestamp ?? createTimestampFormatter()
    this.headerWritten = options.resume ?? false

    if (this.delimiter.length === 0 || this.delimiter === '"' || this.delimiter === '.') {
      throw new RangeError(`Unusable delimiter ${JSON.stringify(this.delimiter)}`)
    }
  }

  /** Rows written by this serializer, header excluded */
  get rowsWritten(): number {
    return this._rowsWritten
  }

  writeHeader(): void {
    if (this.headerWritten) return
    const labels = [this.timestampLabel, ...this.schema.columns.map(headerLabel)]
    this.emit(labels)
    this.headerWritten = true
  }

  writeRecord(record: AssembledRecord): void {
    if (record.cells.length !== this.schema.columns.length) {
      throw new SchemaViolationError(
        `Record has ${record.cells.length} cells, schema has ${this.schema.columns.length} columns`,
      )
    }

    this.writeHeader()
    this.emit([this.formatTimestamp(record.timestamp), ...record.cells.map(formatCell)])
    this._rowsWritten++
  }

  private emit(cells: string[]): void {
    const line = cells.map(c => quoteCell(c, this.delimiter)).join(this.delimiter) + '\n'
    try {
      this.sink.write(line)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new SinkWriteError(`Failed to write row: ${reason}`, { cause: err })
    }
  }
}
