/**
 * Value Arithmetic
 *
 * Partial arithmetic over machine values. Undefined combinations and
 * 32-bit overflow come back as run errors instead of throwing.
 */

import {
  intValue,
  isCharValue,
  isIntValue,
  RUN_ERRORS,
  RunError,
  type Safe,
  safeError,
  safeResult,
  type Value,
  VALUE_LIMITS,
} from '@hrm/types'

function checkedInt(result: number): Safe<Value, RunError> {
  if (result < VALUE_LIMITS.MIN_INT || result > VALUE_LIMITS.MAX_INT) {
    return safeError(
      new RunError({ code: RUN_ERRORS.INTEGER_OVERFLOW, result }),
    )
  }
  return safeResult(intValue(result))
}

function incompatible(lhs: Value, rhs: Value): Safe<Value, RunError> {
  return safeError(
    new RunError({ code: RUN_ERRORS.INCOMPATIBLE_TYPES, lhs, rhs }),
  )
}

/**
 * Int + Int, every other pair is incompatible
 */
export function addValues(lhs: Value, rhs: Value): Safe<Value, RunError> {
  if (isIntValue(lhs) && isIntValue(rhs)) {
    return checkedInt(lhs.value + rhs.value)
  }
  return incompatible(lhs, rhs)
}

/**
 * Int - Int, or Char - Char giving the distance between code points
 */
export function subValues(lhs: Value, rhs: Value): Safe<Value, RunError> {
  if (isIntValue(lhs) && isIntValue(rhs)) {
    return checkedInt(lhs.value - rhs.value)
  }
  if (isCharValue(lhs) && isCharValue(rhs)) {
    return checkedInt(codePoint(lhs.value) - codePoint(rhs.value))
  }
  return incompatible(lhs, rhs)
}

function codePoint(char: string): number {
  return char.codePointAt(0) ?? 0
}

export function valuesEqual(lhs: Value, rhs: Value): boolean {
  return lhs.kind === rhs.kind && lhs.value === rhs.value
}

/** A character is never zero */
export function isZero(value: Value): boolean {
  return isIntValue(value) && value.value === 0
}

/** A character is never negative */
export function isNegative(value: Value): boolean {
  return isIntValue(value) && value.value < 0
}

export function formatValue(value: Value): string {
  return value.kind === 'int' ? String(value.value) : value.value
}
