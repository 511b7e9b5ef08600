/**
 * VM Package Exports
 *
 * Execution engine: values, addressing, instruction set, programs and problems
 */

// Configuration constants
export { BUMP_AMOUNT, HALT_REASONS, type HaltReason } from './config'
export { createGameState } from './game-state'
// Instruction handlers
export type {
  CommandShape,
  InstructionContext,
  InstructionHandler,
  InstructionResult,
} from './instructions/base'
export {
  formatCommandValue,
  parseCommandValue,
  parseLabel,
} from './instructions/operands'
export { InstructionRegistry } from './instructions/registry'
export { readAccumulator, readMemory, resolveIndex, writeMemory } from './memory'
export { ProblemBuilder, problemFromDefinition } from './problem'
export { type CaseResult, Program, ProgramBuilder } from './program'
export {
  addValues,
  formatValue,
  isNegative,
  isZero,
  subValues,
  valuesEqual,
} from './value'
