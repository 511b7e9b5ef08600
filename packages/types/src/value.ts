/**
 * Machine Values
 *
 * Every cell of memory, the accumulator and both IO tapes hold one of these.
 */

export interface IntValue {
  kind: 'int'
  value: number
}

export interface CharValue {
  kind: 'char'
  /** Exactly one code point */
  value: string
}

export type Value = IntValue | CharValue

/** A memory cell is either empty or holds a value */
export type MemoryCell = Value | null

export type Memory = MemoryCell[]

// i32 bounds
export const VALUE_LIMITS = {
  MIN_INT: -2_147_483_648,
  MAX_INT: 2_147_483_647,
} as const

export function intValue(value: number): IntValue {
  return { kind: 'int', value }
}

export function charValue(value: string): CharValue {
  return { kind: 'char', value }
}

export function isIntValue(value: Value): value is IntValue {
  return value.kind === 'int'
}

export function isCharValue(value: Value): value is CharValue {
  return value.kind === 'char'
}

/**
 * Check that a string holds exactly one code point
 */
export function isSingleChar(value: string): boolean {
  return Array.from(value).length === 1
}
