import type { CommandKeyword } from './commands'
import type { MemoryCell, Value } from './value'

export const PROBLEM_LIMITS = {
  /** Largest memory a problem may declare */
  MAX_MEMORY_SIZE: 1024,
} as const

/**
 * One test case: values fed to INBOX and values OUTBOX must produce, in order
 */
export interface ProblemIO {
  input: readonly Value[]
  output: readonly Value[]
}

/**
 * Static definition of a puzzle
 */
export interface Problem {
  readonly ios: readonly ProblemIO[]
  /** Initial memory, its length is the memory size */
  readonly memory: readonly MemoryCell[]
  readonly availableCommands: ReadonlySet<CommandKeyword>
}

export function isCommandAvailable(
  problem: Problem,
  keyword: CommandKeyword,
): boolean {
  return problem.availableCommands.has(keyword)
}
