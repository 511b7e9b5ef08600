import type { GameState, MemoryCell, Value } from '@hrm/types'
import { createGameState } from '../game-state'
import type { InstructionContext } from '../instructions/base'

interface StateOverrides {
  input?: Value[]
  output?: Value[]
  memory?: MemoryCell[]
  accumulator?: Value | null
}

export function createState(overrides: StateOverrides = {}): GameState {
  const state = createGameState(
    { input: overrides.input ?? [], output: overrides.output ?? [] },
    overrides.memory ?? [],
  )
  state.accumulator = overrides.accumulator ?? null
  return state
}

export function createContext(
  overrides: StateOverrides = {},
  labels: Record<string, number> = {},
): InstructionContext {
  return {
    state: createState(overrides),
    labels: new Map(Object.entries(labels)),
  }
}
