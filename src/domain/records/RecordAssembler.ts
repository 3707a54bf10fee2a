/**
 * RecordAssembler - groups resolved frames into one record per device pair
 * and sampling cycle.
 *
 * Each device pair moves through two phases:
 *   discovering: the first cycle is collected; its fields define the columns
 *   frozen:      columns are fixed; later cycles fill them, missing values stay empty
 */
import type {
  AssembledRecord,
  Cell,
  Column,
  DeviceKey,
  ResolvedFrame,
  Schema,
} from '../types/Telegram'
import { hex16 } from '../spec/SpecificationTable'
import { type CycleBoundaryRule, repeatedCommandRule } from './cycleRules'

export interface AssemblerOptions {
  /** Timestamp of cycle 0, milliseconds since the epoch */
  startTimestamp: number
  samplingIntervalMs: number
  cycleRule?: CycleBoundaryRule
}

export interface CompletedRecord {
  record: AssembledRecord
  schema: Schema
}

type PairState =
  | { phase: 'discovering'; device: DeviceKey; open: ResolvedFrame[] }
  | {
    phase: 'frozen'
    device: DeviceKey
    open: ResolvedFrame[]
    schema: Schema
    columnIndex: Map<string, number>
    nextCycle: number
  }

interface KeyedCell {
  key: string
  column: Column
  cell: Cell
}

/** Stable identifier of a device pair, e.g. "4221_0010" */
export function deviceId(device: DeviceKey): string {
  const hex = (n: number) => n.toString(16).toUpperCase().padStart(4, '0')
  return `${hex(device.source)}_${hex(device.destination)}`
}

export function payloadKey(command: number): string {
  return `${hex16(command)}/payload`
}

/**
 * Flatten one cycle into cells in arrival order, last value winning when a
 * key repeats within the cycle.
 */
function collectCells(open: readonly ResolvedFrame[]): KeyedCell[] {
  const byKey = new Map<string, KeyedCell>()

  for (const rf of open) {
    if (!rf.specification) {
      const key = payloadKey(rf.frame.command)
      byKey.set(key, {
        key,
        column: { key, label: `Payload ${hex16(rf.frame.command)}`, unit: '', decimals: 0, kind: 'payload' },
        cell: { kind: 'payload', command: rf.frame.command, payload: rf.frame.payload },
      })
      continue
    }

    for (const field of rf.fields) {
      byKey.set(field.key, {
        key: field.key,
        column: { key: field.key, label: field.label, unit: field.unit, decimals: field.decimals, kind: 'value' },
        cell: { kind: 'value', field },
      })
    }
  }

  return Array.from(byKey.values())
}

export class RecordAssembler {
  private readonly options: AssemblerOptions
  private readonly cycleRule: CycleBoundaryRule
  private readonly pairs = new Map<string, PairState>()
  private readonly reportedOutsideSchema = new Set<string>()
  private _fieldsOutsideSchema = 0

  constructor(options: AssemblerOptions) {
    if (!(options.samplingIntervalMs > 0)) {
      throw new RangeError(`Sampling interval must be positive, got ${options.samplingIntervalMs}`)
    }
    this.options = options
    this.cycleRule = options.cycleRule ?? repeatedCommandRule()
  }

  /** Values dropped because their column was not part of the frozen schema */
  get fieldsOutsideSchema(): number {
    return this._fieldsOutsideSchema
  }

  schemaFor(device: DeviceKey): Schema | undefined {
    const state = this.pairs.get(deviceId(device))
    return state?.phase === 'frozen' ? state.schema : undefined
  }

  /**
   * Add a frame. Returns the record it completed, if it opened a new cycle.
   */
  push(rf: ResolvedFrame): CompletedRecord[] {
    const device = { source: rf.frame.source, destination: rf.frame.destination }
    const id = deviceId(device)

    let state = this.pairs.get(id)
    if (!state) {
      state = { phase: 'discovering', device, open: [] }
      this.pairs.set(id, state)
    }

    const completed: CompletedRecord[] = []
    if (state.open.length > 0 && this.cycleRule.startsNewCycle(state.open, rf)) {
      completed.push(this.closeCycle(id, state))
    }

    // closeCycle may have replaced the state object
    const current = this.pairs.get(id) ?? state
    current.open.push(rf)

    return completed
  }

  /**
   * Close every open cycle, in order of first appearance of each device pair.
   */
  flush(): CompletedRecord[] {
    const completed: CompletedRecord[] = []
    for (const [id, state] of this.pairs) {
      if (state.open.length > 0) {
        completed.push(this.closeCycle(id, state))
      }
    }
    return completed
  }

  private closeCycle(id: string, state: PairState): CompletedRecord {
    const cells = collectCells(state.open)

    let frozen: Extract<PairState, { phase: 'frozen' }>
    if (state.phase === 'discovering') {
      const columns = cells.map(c => c.column)
      const name = state.open.find(rf => rf.specification)?.specification?.name
      frozen = {
        phase: 'frozen',
        device: state.device,
        open: [],
        schema: { device: state.device, name, columns },
        columnIndex: new Map(columns.map((c, i) => [c.key, i])),
        nextCycle: 0,
      }
      this.pairs.set(id, frozen)
    } else {
      frozen = state
    }

    const row: (Cell | null)[] = new Array<Cell | null>(frozen.schema.columns.length).fill(null)
    for (const c of cells) {
      const index = frozen.columnIndex.get(c.key)
      if (index === undefined) {
        this.reportOutsideSchema(id, c.key)
        continue
      }
      row[index] = c.cell
    }

    const cycle = frozen.nextCycle++
    frozen.open = []

    return {
      schema: frozen.schema,
      record: {
        device: frozen.device,
        timestamp: this.options.startTimestamp + cycle * this.options.samplingIntervalMs,
        cycle,
        cells: row,
      },
    }
  }

  private reportOutsideSchema(id: string, key: string): void {
    this._fieldsOutsideSchema++
    const tag = `${id}|${key}`
    if (this.reportedOutsideSchema.has(tag)) return
    this.reportedOutsideSchema.add(tag)
    console.warn(`Record assembler: ${key} from device ${id} appeared after its columns were fixed and is not written`)
  }
}
