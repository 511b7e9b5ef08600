/**
 * Base Instruction System
 *
 * Defines the handler contract and the abstract classes shared by the
 * three instruction families (IO, memory operand, jump).
 *
 * Handlers are stateless: everything that changes while a program runs
 * lives in the GameState passed through the context.
 */

import {
  type Command,
  type GameState,
  type IoCommand,
  type IoKeyword,
  type JumpCommand,
  type JumpKeyword,
  type MemoryCommand,
  type MemoryKeyword,
  RUN_ERRORS,
  RunError,
  type Safe,
  safeError,
  safeResult,
} from '@hrm/types'
import type { HaltReason } from '../config'
import { formatCommandValue, parseCommandValue, parseLabel } from './operands'

/**
 * Everything an instruction may read or mutate
 */
export interface InstructionContext {
  state: GameState
  /** Label name → index of the instruction following its declaration */
  labels: ReadonlyMap<string, number>
}

/**
 * Any command of one instruction family. Family bases stay generic over
 * their keyword, which the per-keyword Command union cannot express.
 */
export type CommandShape = IoCommand | MemoryCommand | JumpCommand

/**
 * null = continue, otherwise the reason the IO case stops
 */
export type InstructionResult = Safe<HaltReason | null, RunError>

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler<C extends CommandShape = Command> {
  readonly keyword: C['keyword']

  /**
   * Parse the argument string following the keyword
   * @returns null if the arguments do not match the instruction's grammar
   */
  parse(args: string): C | null

  /**
   * Execute the instruction (mutates context.state, not the program counter)
   */
  execute(command: C, context: InstructionContext): InstructionResult

  /**
   * Index of the next instruction to execute
   */
  next(command: C, context: InstructionContext): Safe<number, RunError>

  /** Memory cell statically referenced by the command */
  requiresIndex(command: C): number | null

  /** Label the command jumps to */
  requiresLabel(command: C): string | null

  /** Canonical source text */
  format(command: C): string
}

/**
 * Abstract base class for instructions
 */
export abstract class BaseInstruction<C extends CommandShape>
  implements InstructionHandler<C>
{
  abstract readonly keyword: C['keyword']

  abstract parse(args: string): C | null

  abstract execute(command: C, context: InstructionContext): InstructionResult

  next(_command: C, context: InstructionContext): Safe<number, RunError> {
    return safeResult(context.state.programCounter + 1)
  }

  requiresIndex(_command: C): number | null {
    return null
  }

  requiresLabel(_command: C): string | null {
    return null
  }

  format(_command: C): string {
    return this.keyword
  }

  protected continue(): InstructionResult {
    return safeResult(null)
  }
}

/**
 * Instructions without arguments
 */
export abstract class IoInstruction<K extends IoKeyword> extends BaseInstruction<
  IoCommand<K>
> {
  parse(args: string): IoCommand<K> | null {
    return args === '' ? { keyword: this.keyword } : null
  }
}

/**
 * Instructions taking one memory operand
 */
export abstract class MemoryInstruction<
  K extends MemoryKeyword,
> extends BaseInstruction<MemoryCommand<K>> {
  parse(args: string): MemoryCommand<K> | null {
    const operand = parseCommandValue(args)
    return operand === null ? null : { keyword: this.keyword, operand }
  }

  /**
   * Both modes touch the operand cell itself: directly for a literal,
   * as the pointer for an indirect operand
   */
  requiresIndex(command: MemoryCommand<K>): number | null {
    return command.operand.index
  }

  format(command: MemoryCommand<K>): string {
    return `${this.keyword} ${formatCommandValue(command.operand)}`
  }
}

/**
 * Instructions taking a label, optionally jumping to it
 */
export abstract class JumpInstruction<K extends JumpKeyword> extends BaseInstruction<
  JumpCommand<K>
> {
  /**
   * Whether the jump is taken for the current state
   */
  protected abstract shouldJump(state: GameState): boolean

  parse(args: string): JumpCommand<K> | null {
    const label = parseLabel(args)
    return label === null ? null : { keyword: this.keyword, label }
  }

  next(
    command: JumpCommand<K>,
    context: InstructionContext,
  ): Safe<number, RunError> {
    if (!this.shouldJump(context.state)) {
      return safeResult(context.state.programCounter + 1)
    }

    const target = context.labels.get(command.label)
    if (target === undefined) {
      return safeError(
        new RunError({
          code: RUN_ERRORS.UNKNOWN_LABEL,
          label: command.label,
        }),
      )
    }
    return safeResult(target)
  }

  requiresLabel(command: JumpCommand<K>): string | null {
    return command.label
  }

  format(command: JumpCommand<K>): string {
    return `${this.keyword} ${command.label}`
  }
}
