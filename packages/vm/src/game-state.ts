import type { GameState, MemoryCell, ProblemIO } from '@hrm/types'

/**
 * Fresh machine state for one IO case
 *
 * Memory is copied so the problem template is never written to.
 */
export function createGameState(
  io: ProblemIO,
  memory: readonly MemoryCell[],
): GameState {
  return {
    input: io.input,
    output: io.output,
    memory: [...memory],
    accumulator: null,
    inputCursor: 0,
    outputCursor: 0,
    programCounter: 0,
    steps: 0,
  }
}
