import { compile } from '@hrm/compiler'
import type {
  CompileError,
  Problem,
  RunError,
  RunOptions,
  Safe,
  Score,
  ValidationError,
} from '@hrm/types'
import { safeError } from '@hrm/types'

export type EvaluationError = CompileError | ValidationError | RunError

/**
 * Compile a solution, validate it against the problem, then run it
 */
export function evaluateSolution(
  problem: Problem,
  source: string,
  options: RunOptions = {},
): Safe<Score, EvaluationError> {
  const [compileError, program] = compile(source)
  if (compileError) return safeError(compileError)

  const [validationError] = program.validate(problem)
  if (validationError) return safeError(validationError)

  return program.run(problem, options)
}
