/**
 * VM Configuration Constants
 */

// Halt reasons, returned by an instruction to stop the current IO case
export const HALT_REASONS = {
  /** Program counter reached the instruction count */
  END_OF_PROGRAM: 'end_of_program',
  /** INBOX ran with an empty input tape; this step is not scored */
  INPUT_EXHAUSTED: 'input_exhausted',
} as const

export type HaltReason = (typeof HALT_REASONS)[keyof typeof HALT_REASONS]

// Amount BUMPUP adds and BUMPDN subtracts
export const BUMP_AMOUNT = 1
