import type { Memory, Value } from './value'

/**
 * Mutable machine state of a single IO case
 */
export interface GameState {
  readonly input: readonly Value[]
  readonly output: readonly Value[]
  memory: Memory
  accumulator: Value | null
  inputCursor: number
  outputCursor: number
  programCounter: number
  steps: number
}

export interface RunOptions {
  /** Fail a case once it needs more than this many steps */
  maxSteps?: number
}

export interface Score {
  /** Instruction count */
  size: number
  speedMin: number
  speedMax: number
  speedAvg: number
}
