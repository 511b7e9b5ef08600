/**
 * Control Flow Instructions
 *
 * JUMP, JUMPZ, JUMPN
 */

import { type GameState, type JumpCommand, safeError } from '@hrm/types'
import { readAccumulator } from '../memory'
import { isNegative, isZero } from '../value'
import { type InstructionContext, type InstructionResult, JumpInstruction } from './base'

/**
 * JUMP instruction
 * Unconditional jump to a label
 */
export class JUMPInstruction extends JumpInstruction<'JUMP'> {
  readonly keyword = 'JUMP'

  execute(
    _command: JumpCommand<'JUMP'>,
    _context: InstructionContext,
  ): InstructionResult {
    return this.continue()
  }

  protected shouldJump(_state: GameState): boolean {
    return true
  }
}

/**
 * JUMPZ instruction
 * Jumps when the accumulator holds the integer 0
 */
export class JUMPZInstruction extends JumpInstruction<'JUMPZ'> {
  readonly keyword = 'JUMPZ'

  execute(
    _command: JumpCommand<'JUMPZ'>,
    context: InstructionContext,
  ): InstructionResult {
    const [error] = readAccumulator(context.state)
    if (error) return safeError(error)
    return this.continue()
  }

  protected shouldJump(state: GameState): boolean {
    return state.accumulator !== null && isZero(state.accumulator)
  }
}

/**
 * JUMPN instruction
 * Jumps when the accumulator holds a negative integer
 */
export class JUMPNInstruction extends JumpInstruction<'JUMPN'> {
  readonly keyword = 'JUMPN'

  execute(
    _command: JumpCommand<'JUMPN'>,
    context: InstructionContext,
  ): InstructionResult {
    const [error] = readAccumulator(context.state)
    if (error) return safeError(error)
    return this.continue()
  }

  protected shouldJump(state: GameState): boolean {
    return state.accumulator !== null && isNegative(state.accumulator)
  }
}
