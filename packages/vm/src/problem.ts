/**
 * Problem construction
 *
 * ProblemBuilder assembles a Problem step by step; problemFromDefinition
 * turns a validated problem definition into one.
 */

import type { ProblemDefinition } from '@hrm/core'
import {
  COMMAND_KEYWORDS,
  type CommandKeyword,
  isCommandKeyword,
  type MemoryCell,
  PROBLEM_LIMITS,
  type Problem,
  type ProblemIO,
  type Safe,
  safeError,
  safeResult,
  type Value,
} from '@hrm/types'

export class ProblemBuilder {
  private readonly ios: ProblemIO[] = []
  private size = 0
  private readonly slots = new Map<number, Value>()
  private readonly commands = new Set<CommandKeyword>()

  addIo(input: readonly Value[], output: readonly Value[]): this {
    this.ios.push({ input: [...input], output: [...output] })
    return this
  }

  memorySize(size: number): this {
    this.size = size
    return this
  }

  /**
   * Seed a memory cell; a later call for the same index replaces it
   */
  addMemorySlot(index: number, value: Value): this {
    this.slots.set(index, value)
    return this
  }

  enableAllCommands(): this {
    for (const keyword of COMMAND_KEYWORDS) {
      this.commands.add(keyword)
    }
    return this
  }

  /**
   * Enable a command by keyword; unknown keywords are ignored
   */
  enableCommand(keyword: string): this {
    if (isCommandKeyword(keyword)) {
      this.commands.add(keyword)
    }
    return this
  }

  disableCommand(keyword: CommandKeyword): this {
    this.commands.delete(keyword)
    return this
  }

  build(): Safe<Problem> {
    if (this.ios.length === 0) {
      return safeError(new Error('A problem needs at least one IO case'))
    }
    if (
      !Number.isInteger(this.size) ||
      this.size < 0 ||
      this.size > PROBLEM_LIMITS.MAX_MEMORY_SIZE
    ) {
      return safeError(
        new Error(
          `Invalid memory size ${this.size}, expected 0 to ${PROBLEM_LIMITS.MAX_MEMORY_SIZE}`,
        ),
      )
    }

    const memory: MemoryCell[] = new Array<MemoryCell>(this.size).fill(null)
    for (const [index, value] of this.slots) {
      if (!Number.isInteger(index) || index < 0 || index >= this.size) {
        return safeError(
          new Error(
            `Memory slot ${index} is outside a memory of size ${this.size}`,
          ),
        )
      }
      memory[index] = value
    }

    return safeResult({
      ios: [...this.ios],
      memory,
      availableCommands: new Set(this.commands),
    })
  }
}

/**
 * Build a Problem from a definition that already passed schema validation
 */
export function problemFromDefinition(
  definition: ProblemDefinition,
): Safe<Problem> {
  const builder = new ProblemBuilder()

  for (const io of definition.ios) {
    builder.addIo(io.input, io.output)
  }

  const memory = definition.memory
  if (memory !== undefined) {
    if ('full' in memory) {
      builder.memorySize(memory.full.length)
      memory.full.forEach((cell, index) => {
        if (cell !== null) builder.addMemorySlot(index, cell)
      })
    } else {
      builder.memorySize(memory.partial.dim)
      for (const [key, value] of Object.entries(memory.partial.values)) {
        builder.addMemorySlot(Number(key), value)
      }
    }
  }

  for (const keyword of definition.commands) {
    builder.enableCommand(keyword)
  }

  return builder.build()
}
