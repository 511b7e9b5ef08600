/**
 * IO Instructions
 *
 * INBOX, OUTBOX
 */

import { logger } from '@hrm/core'
import {
  type IoCommand,
  RUN_ERRORS,
  RunError,
  safeError,
  safeResult,
} from '@hrm/types'
import { HALT_REASONS } from '../config'
import { readAccumulator } from '../memory'
import { formatValue, valuesEqual } from '../value'
import { type InstructionContext, type InstructionResult, IoInstruction } from './base'

/**
 * INBOX instruction
 * Moves the next input value into the accumulator.
 * An empty input tape ends the IO case; that step is not scored.
 */
export class INBOXInstruction extends IoInstruction<'INBOX'> {
  readonly keyword = 'INBOX'

  execute(
    _command: IoCommand<'INBOX'>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const next = state.input[state.inputCursor]
    if (next === undefined) {
      return safeResult(HALT_REASONS.INPUT_EXHAUSTED)
    }

    state.accumulator = next
    state.inputCursor += 1
    return this.continue()
  }
}

/**
 * OUTBOX instruction
 * Checks the accumulator against the next expected output value.
 */
export class OUTBOXInstruction extends IoInstruction<'OUTBOX'> {
  readonly keyword = 'OUTBOX'

  execute(
    _command: IoCommand<'OUTBOX'>,
    context: InstructionContext,
  ): InstructionResult {
    const { state } = context
    const [error, value] = readAccumulator(state)
    if (error) return safeError(error)

    const expected = state.output[state.outputCursor] ?? null
    if (expected === null || !valuesEqual(value, expected)) {
      return safeError(
        new RunError({
          code: RUN_ERRORS.INCORRECT_OUTPUT,
          expected,
          actual: value,
        }),
      )
    }

    logger.trace('OUTBOX: produced value', {
      value: formatValue(value),
      outputCursor: state.outputCursor,
    })

    state.outputCursor += 1
    return this.continue()
  }
}
