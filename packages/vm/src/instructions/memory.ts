/**
 * Memory Instructions
 *
 * COPYFROM, COPYTO
 */

import { type MemoryCommand, safeError } from '@hrm/types'
import { readAccumulator, readMemory, resolveIndex, writeMemory } from '../memory'
import { type InstructionContext, type InstructionResult, MemoryInstruction } from './base'

/**
 * COPYFROM instruction
 * accumulator = memory[index]
 */
export class COPYFROMInstruction extends MemoryInstruction<'COPYFROM'> {
  readonly keyword = 'COPYFROM'

  execute(
    command: MemoryCommand<'COPYFROM'>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const [indexError, index] = resolveIndex(command.operand, state.memory)
    if (indexError) return safeError(indexError)

    const [readError, value] = readMemory(state.memory, index)
    if (readError) return safeError(readError)

    state.accumulator = value
    return this.continue()
  }
}

/**
 * COPYTO instruction
 * memory[index] = accumulator
 */
export class COPYTOInstruction extends MemoryInstruction<'COPYTO'> {
  readonly keyword = 'COPYTO'

  execute(
    command: MemoryCommand<'COPYTO'>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const [accError, value] = readAccumulator(state)
    if (accError) return safeError(accError)

    const [indexError, index] = resolveIndex(command.operand, state.memory)
    if (indexError) return safeError(indexError)

    const [writeError] = writeMemory(state.memory, index, value)
    if (writeError) return safeError(writeError)

    return this.continue()
  }
}
