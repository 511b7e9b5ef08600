/**
 * Program
 *
 * An ordered instruction sequence plus its label table. Owns the static
 * validation against a problem and the orchestration of every IO case.
 */

import { logger } from '@hrm/core'
import {
  type Command,
  isCommandAvailable,
  type MemoryCell,
  type Problem,
  type ProblemIO,
  RUN_ERRORS,
  RunError,
  type RunOptions,
  type Safe,
  type Score,
  safeError,
  safeResult,
  VALIDATION_ERRORS,
  ValidationError,
} from '@hrm/types'
import { max, min, sum } from 'radash'
import { HALT_REASONS, type HaltReason } from './config'
import { createGameState } from './game-state'
import type { InstructionContext } from './instructions/base'
import { InstructionRegistry } from './instructions/registry'

/**
 * Steps taken by a single IO case and why it stopped
 */
export interface CaseResult {
  steps: number
  haltReason: HaltReason
}

export class Program {
  readonly commands: readonly Command[]
  readonly labels: ReadonlyMap<string, number>
  private readonly registry = InstructionRegistry.getInstance()

  constructor(commands: readonly Command[], labels: ReadonlyMap<string, number>) {
    this.commands = [...commands]
    this.labels = new Map(labels)
  }

  /** Instruction count, the implicit terminator excluded */
  get size(): number {
    return this.commands.length
  }

  getLabel(name: string): number | undefined {
    return this.labels.get(name)
  }

  /**
   * Check the program against a problem without running it
   *
   * Commands are checked in order (availability, memory index, label), then
   * label targets. The first violation is returned.
   */
  validate(problem: Problem): Safe<void, ValidationError> {
    for (const command of this.commands) {
      const [error] = this.validateCommand(command, problem)
      if (error) {
        logger.debug('Program validation failed', {
          code: error.code,
          command: this.registry.getHandler(command.keyword).format(command),
        })
        return safeError(error)
      }
    }

    for (const [label, index] of this.labels) {
      if (index > this.commands.length) {
        const error = new ValidationError({
          code: VALIDATION_ERRORS.LABEL_INDEX,
          label,
          index,
        })
        logger.debug('Program validation failed', { code: error.code, label })
        return safeError(error)
      }
    }

    return safeResult(undefined)
  }

  private validateCommand(
    command: Command,
    problem: Problem,
  ): Safe<void, ValidationError> {
    if (!isCommandAvailable(problem, command.keyword)) {
      return safeError(
        new ValidationError({
          code: VALIDATION_ERRORS.COMMAND_NOT_AVAILABLE,
          keyword: command.keyword,
        }),
      )
    }

    const handler = this.registry.getHandler(command.keyword)

    const index = handler.requiresIndex(command)
    if (index !== null && index >= problem.memory.length) {
      return safeError(
        new ValidationError({ code: VALIDATION_ERRORS.COMMAND_INDEX, index }),
      )
    }

    const label = handler.requiresLabel(command)
    if (label !== null && !this.labels.has(label)) {
      return safeError(
        new ValidationError({ code: VALIDATION_ERRORS.MISSING_LABEL, label }),
      )
    }

    return safeResult(undefined)
  }

  /**
   * Run every IO case of the problem and score the program
   *
   * Each case starts from a fresh copy of the memory template. The first
   * run error aborts the whole run.
   */
  run(problem: Problem, options: RunOptions = {}): Safe<Score, RunError> {
    const speeds: number[] = []

    for (const [caseIndex, io] of problem.ios.entries()) {
      const [error, result] = this.runCase(io, problem.memory, options)
      if (error) {
        logger.debug('IO case failed', { caseIndex, code: error.code })
        return safeError(error)
      }

      logger.debug('IO case passed', {
        caseIndex,
        steps: result.steps,
        haltReason: result.haltReason,
      })
      speeds.push(result.steps)
    }

    return safeResult(this.score(speeds))
  }

  /**
   * Run a single IO case against the given memory template
   */
  runCase(
    io: ProblemIO,
    memory: readonly MemoryCell[],
    options: RunOptions = {},
  ): Safe<CaseResult, RunError> {
    const state = createGameState(io, memory)
    const context: InstructionContext = { state, labels: this.labels }
    let haltReason: HaltReason = HALT_REASONS.END_OF_PROGRAM

    while (true) {
      const command = this.commands[state.programCounter]
      if (command === undefined) {
        break
      }

      const handler = this.registry.getHandler(command.keyword)
      state.steps += 1

      const [executeError, halt] = handler.execute(command, context)
      if (executeError) return safeError(executeError)

      if (halt !== null) {
        if (halt === HALT_REASONS.INPUT_EXHAUSTED) {
          state.steps -= 1
        }
        haltReason = halt
        break
      }

      if (options.maxSteps !== undefined && state.steps > options.maxSteps) {
        return safeError(
          new RunError({
            code: RUN_ERRORS.STEP_LIMIT_EXCEEDED,
            limit: options.maxSteps,
          }),
        )
      }

      const [nextError, next] = handler.next(command, context)
      if (nextError) return safeError(nextError)
      state.programCounter = next
    }

    const missing = state.output[state.outputCursor]
    if (missing !== undefined) {
      return safeError(
        new RunError({
          code: RUN_ERRORS.INCORRECT_OUTPUT,
          expected: missing,
          actual: null,
        }),
      )
    }

    return safeResult({ steps: state.steps, haltReason })
  }

  private score(speeds: number[]): Score {
    return {
      size: this.size,
      speedMin: min(speeds) ?? 0,
      speedMax: max(speeds) ?? 0,
      speedAvg: speeds.length === 0 ? 0 : sum(speeds) / speeds.length,
    }
  }

  /**
   * Canonical source listing, labels on their own line
   */
  format(): string {
    const labelsAt = new Map<number, string[]>()
    for (const [label, index] of this.labels) {
      labelsAt.set(index, [...(labelsAt.get(index) ?? []), label])
    }

    const lines: string[] = []
    for (let index = 0; index <= this.commands.length; index++) {
      for (const label of labelsAt.get(index) ?? []) {
        lines.push(`${label}:`)
      }
      const command = this.commands[index]
      if (command !== undefined) {
        lines.push(this.registry.getHandler(command.keyword).format(command))
      }
    }
    return lines.join('\n')
  }
}

/**
 * Incremental construction of a Program
 */
export class ProgramBuilder {
  private readonly commands: Command[] = []
  private readonly labels = new Map<string, number>()

  addCommand(command: Command): this {
    this.commands.push(command)
    return this
  }

  /**
   * Bind a label to the next command added; a redeclared label moves
   */
  addLabel(name: string): this {
    this.labels.set(name, this.commands.length)
    return this
  }

  build(): Program {
    return new Program(this.commands, this.labels)
  }
}
