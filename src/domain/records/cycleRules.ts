/**
 * Cycle boundary rules decide where one sampling cycle of a device pair ends.
 *
 * Which rule matches a device depends on how its firmware schedules
 * commands, so the assembler takes the rule as a parameter.
 */
import type { ResolvedFrame } from '../types/Telegram'

export interface CycleBoundaryRule {
  readonly name: string
  /**
   * True when `next` must open a new cycle instead of joining `open`.
   * Only called with a non-empty open cycle of the same device pair.
   */
  startsNewCycle(open: readonly ResolvedFrame[], next: ResolvedFrame): boolean
}

/** A command seen twice closes the cycle: each command is sent once per tick */
export function repeatedCommandRule(): CycleBoundaryRule {
  return {
    name: 'repeated-command',
    startsNewCycle: (open, next) => open.some(rf => rf.frame.command === next.frame.command),
  }
}

/** Every cycle holds exactly `frames` frames */
export function fixedLengthRule(frames: number): CycleBoundaryRule {
  if (!Number.isInteger(frames) || frames < 1) {
    throw new RangeError(`Cycle length must be a positive integer, got ${frames}`)
  }
  return {
    name: `fixed-length(${frames})`,
    startsNewCycle: (open) => open.length >= frames,
  }
}

/** Each occurrence of `command` opens a cycle */
export function leadingCommandRule(command: number): CycleBoundaryRule {
  return {
    name: `leading-command(${command})`,
    startsNewCycle: (_open, next) => next.frame.command === command,
  }
}
