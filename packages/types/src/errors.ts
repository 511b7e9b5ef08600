/**
 * HRM Error Constants and Classes
 *
 * Errors are split in three tiers:
 * - compile errors: the source text is not a program
 * - validation errors: the program is structurally unfit for a problem
 * - run errors: the program misbehaved while running an IO case
 */

import type { CommandKeyword } from './commands'
import type { Value } from './value'

/**
 * Compiler Error Codes
 */
export const COMPILE_ERRORS = {
  ILLEGAL_LINE: 'illegal_line',
} as const

/**
 * Validation Error Codes
 */
export const VALIDATION_ERRORS = {
  COMMAND_NOT_AVAILABLE: 'command_not_available',
  COMMAND_INDEX: 'command_index',
  MISSING_LABEL: 'missing_label',
  LABEL_INDEX: 'label_index',
} as const

/**
 * Run Error Codes
 */
export const RUN_ERRORS = {
  EMPTY_ACCUMULATOR: 'empty_accumulator',
  EMPTY_MEMORY: 'empty_memory',
  INDEX_OUT_OF_RANGE: 'index_out_of_range',
  CHAR_USED_AS_INDEX: 'char_used_as_index',
  INCOMPATIBLE_TYPES: 'incompatible_types',
  INTEGER_OVERFLOW: 'integer_overflow',
  INCORRECT_OUTPUT: 'incorrect_output',
  UNKNOWN_LABEL: 'unknown_label',
  STEP_LIMIT_EXCEEDED: 'step_limit_exceeded',
} as const

export type CompileErrorDetail = {
  code: typeof COMPILE_ERRORS.ILLEGAL_LINE
  line: string
  lineNumber: number
}

export type ValidationErrorDetail =
  | {
      code: typeof VALIDATION_ERRORS.COMMAND_NOT_AVAILABLE
      keyword: CommandKeyword
    }
  | { code: typeof VALIDATION_ERRORS.COMMAND_INDEX; index: number }
  | { code: typeof VALIDATION_ERRORS.MISSING_LABEL; label: string }
  | { code: typeof VALIDATION_ERRORS.LABEL_INDEX; label: string; index: number }

export type RunErrorDetail =
  | { code: typeof RUN_ERRORS.EMPTY_ACCUMULATOR }
  | { code: typeof RUN_ERRORS.EMPTY_MEMORY; index: number }
  | { code: typeof RUN_ERRORS.INDEX_OUT_OF_RANGE; value: Value }
  | { code: typeof RUN_ERRORS.CHAR_USED_AS_INDEX; value: Value }
  | { code: typeof RUN_ERRORS.INCOMPATIBLE_TYPES; lhs: Value; rhs: Value }
  | { code: typeof RUN_ERRORS.INTEGER_OVERFLOW; result: number }
  | {
      code: typeof RUN_ERRORS.INCORRECT_OUTPUT
      /** null when the program produced more values than expected */
      expected: Value | null
      /** null when the program halted before producing every value */
      actual: Value | null
    }
  | { code: typeof RUN_ERRORS.UNKNOWN_LABEL; label: string }
  | { code: typeof RUN_ERRORS.STEP_LIMIT_EXCEEDED; limit: number }

export type CompileErrorCode = CompileErrorDetail['code']
export type ValidationErrorCode = ValidationErrorDetail['code']
export type RunErrorCode = RunErrorDetail['code']

function describe(value: Value | null): string {
  if (value === null) return 'nothing'
  return value.kind === 'int' ? String(value.value) : `'${value.value}'`
}

function describeRunError(detail: RunErrorDetail): string {
  switch (detail.code) {
    case RUN_ERRORS.EMPTY_ACCUMULATOR:
      return 'Accumulator is empty'
    case RUN_ERRORS.EMPTY_MEMORY:
      return `Memory cell ${detail.index} is empty`
    case RUN_ERRORS.INDEX_OUT_OF_RANGE:
      return `Index ${describe(detail.value)} is out of range`
    case RUN_ERRORS.CHAR_USED_AS_INDEX:
      return `Character ${describe(detail.value)} cannot be used as an index`
    case RUN_ERRORS.INCOMPATIBLE_TYPES:
      return `Incompatible operands ${describe(detail.lhs)} and ${describe(detail.rhs)}`
    case RUN_ERRORS.INTEGER_OVERFLOW:
      return `Result ${detail.result} does not fit in 32 bits`
    case RUN_ERRORS.INCORRECT_OUTPUT:
      return `Expected ${describe(detail.expected)} but got ${describe(detail.actual)}`
    case RUN_ERRORS.UNKNOWN_LABEL:
      return `Label '${detail.label}' is not defined`
    case RUN_ERRORS.STEP_LIMIT_EXCEEDED:
      return `Step limit of ${detail.limit} exceeded`
  }
}

function describeValidationError(detail: ValidationErrorDetail): string {
  switch (detail.code) {
    case VALIDATION_ERRORS.COMMAND_NOT_AVAILABLE:
      return `Command ${detail.keyword} is not available`
    case VALIDATION_ERRORS.COMMAND_INDEX:
      return `Memory index ${detail.index} is out of range`
    case VALIDATION_ERRORS.MISSING_LABEL:
      return `Label '${detail.label}' is not defined`
    case VALIDATION_ERRORS.LABEL_INDEX:
      return `Label '${detail.label}' points past the end of the program (${detail.index})`
  }
}

export class CompileError extends Error {
  readonly detail: CompileErrorDetail

  constructor(detail: CompileErrorDetail) {
    super(`Illegal line ${detail.lineNumber}: ${detail.line}`)
    this.name = 'CompileError'
    this.detail = detail
  }

  get code(): CompileErrorCode {
    return this.detail.code
  }
}

export class ValidationError extends Error {
  readonly detail: ValidationErrorDetail

  constructor(detail: ValidationErrorDetail) {
    super(describeValidationError(detail))
    this.name = 'ValidationError'
    this.detail = detail
  }

  get code(): ValidationErrorCode {
    return this.detail.code
  }
}

export class RunError extends Error {
  readonly detail: RunErrorDetail

  constructor(detail: RunErrorDetail) {
    super(describeRunError(detail))
    this.name = 'RunError'
    this.detail = detail
  }

  get code(): RunErrorCode {
    return this.detail.code
  }
}
