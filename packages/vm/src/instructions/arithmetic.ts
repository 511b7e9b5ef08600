/**
 * Arithmetic Instructions
 *
 * ADD, SUB, BUMPUP, BUMPDN
 */

import {
  intValue,
  type MemoryCommand,
  type MemoryKeyword,
  type RunError,
  type Safe,
  safeError,
  type Value,
} from '@hrm/types'
import { BUMP_AMOUNT } from '../config'
import { readAccumulator, readMemory, resolveIndex, writeMemory } from '../memory'
import { addValues, subValues } from '../value'
import { type InstructionContext, type InstructionResult, MemoryInstruction } from './base'

type Operation = (lhs: Value, rhs: Value) => Safe<Value, RunError>

/**
 * accumulator = accumulator <op> memory[index]
 */
abstract class AccumulatorArithmetic<
  K extends MemoryKeyword,
> extends MemoryInstruction<K> {
  protected abstract readonly operation: Operation

  execute(
    command: MemoryCommand<K>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const [accError, lhs] = readAccumulator(state)
    if (accError) return safeError(accError)

    const [indexError, index] = resolveIndex(command.operand, state.memory)
    if (indexError) return safeError(indexError)

    const [readError, rhs] = readMemory(state.memory, index)
    if (readError) return safeError(readError)

    const [opError, result] = this.operation(lhs, rhs)
    if (opError) return safeError(opError)

    state.accumulator = result
    return this.continue()
  }
}

/**
 * memory[index] = memory[index] <op> 1, accumulator = memory[index]
 */
abstract class BumpArithmetic<
  K extends MemoryKeyword,
> extends MemoryInstruction<K> {
  protected abstract readonly operation: Operation

  execute(
    command: MemoryCommand<K>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const [indexError, index] = resolveIndex(command.operand, state.memory)
    if (indexError) return safeError(indexError)

    const [readError, current] = readMemory(state.memory, index)
    if (readError) return safeError(readError)

    const [opError, bumped] = this.operation(current, intValue(BUMP_AMOUNT))
    if (opError) return safeError(opError)

    const [writeError] = writeMemory(state.memory, index, bumped)
    if (writeError) return safeError(writeError)

    state.accumulator = bumped
    return this.continue()
  }
}

/**
 * ADD instruction
 */
export class ADDInstruction extends AccumulatorArithmetic<'ADD'> {
  readonly keyword = 'ADD'
  protected readonly operation = addValues
}

/**
 * SUB instruction
 * Also defined between two characters, giving their distance
 */
export class SUBInstruction extends AccumulatorArithmetic<'SUB'> {
  readonly keyword = 'SUB'
  protected readonly operation = subValues
}

/**
 * BUMPUP instruction
 */
export class BUMPUPInstruction extends BumpArithmetic<'BUMPUP'> {
  readonly keyword = 'BUMPUP'
  protected readonly operation = addValues
}

/**
 * BUMPDN instruction
 */
export class BUMPDNInstruction extends BumpArithmetic<'BUMPDN'> {
  readonly keyword = 'BUMPDN'
  protected readonly operation = subValues
}
