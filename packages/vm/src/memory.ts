/**
 * Memory Access
 *
 * Addressing-mode resolution and checked reads/writes of memory cells and
 * the accumulator.
 */

import {
  type CommandValue,
  type GameState,
  intValue,
  isCharValue,
  type Memory,
  type MemoryCell,
  RUN_ERRORS,
  RunError,
  type Safe,
  safeError,
  safeResult,
  type Value,
} from '@hrm/types'

function outOfRange(value: Value): Safe<never, RunError> {
  return safeError(new RunError({ code: RUN_ERRORS.INDEX_OUT_OF_RANGE, value }))
}

/**
 * Resolve an operand to the index of the cell it designates
 *
 * A literal resolves to itself. An indirect operand resolves to the Int
 * stored in the pointer cell, which must be a valid index.
 */
export function resolveIndex(
  operand: CommandValue,
  memory: readonly MemoryCell[],
): Safe<number, RunError> {
  if (operand.mode === 'literal') {
    return safeResult(operand.index)
  }

  const [error, pointer] = readMemory(memory, operand.index)
  if (error) return safeError(error)

  if (isCharValue(pointer)) {
    return safeError(
      new RunError({ code: RUN_ERRORS.CHAR_USED_AS_INDEX, value: pointer }),
    )
  }
  if (pointer.value < 0 || pointer.value >= memory.length) {
    return outOfRange(pointer)
  }
  return safeResult(pointer.value)
}

export function readMemory(
  memory: readonly MemoryCell[],
  index: number,
): Safe<Value, RunError> {
  if (index < 0 || index >= memory.length) {
    return outOfRange(intValue(index))
  }

  const cell = memory[index]
  if (cell === null || cell === undefined) {
    return safeError(new RunError({ code: RUN_ERRORS.EMPTY_MEMORY, index }))
  }
  return safeResult(cell)
}

export function writeMemory(
  memory: Memory,
  index: number,
  value: Value,
): Safe<Value, RunError> {
  if (index < 0 || index >= memory.length) {
    return outOfRange(intValue(index))
  }

  memory[index] = value
  return safeResult(value)
}

export function readAccumulator(state: GameState): Safe<Value, RunError> {
  if (state.accumulator === null) {
    return safeError(new RunError({ code: RUN_ERRORS.EMPTY_ACCUMULATOR }))
  }
  return safeResult(state.accumulator)
}
