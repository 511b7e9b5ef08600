/**
 * Operand Grammar
 *
 * - memory operand: `12` (literal) or `[12]` (indirect)
 * - jump target: lowercase letters only
 *
 * Operands are matched against the whole argument string, so surrounding
 * whitespace or trailing tokens make the parse fail.
 */

import type { CommandValue } from '@hrm/types'

const LITERAL_PATTERN = /^(\d+)$/
const INDIRECT_PATTERN = /^\[(\d+)\]$/
const LABEL_PATTERN = /^[a-z]+$/

function parseIndex(digits: string): number | null {
  const index = Number(digits)
  return Number.isSafeInteger(index) ? index : null
}

export function parseCommandValue(args: string): CommandValue | null {
  const literalMatch = LITERAL_PATTERN.exec(args)
  if (literalMatch?.[1] !== undefined) {
    const index = parseIndex(literalMatch[1])
    return index === null ? null : { mode: 'literal', index }
  }

  const indirectMatch = INDIRECT_PATTERN.exec(args)
  if (indirectMatch?.[1] !== undefined) {
    const index = parseIndex(indirectMatch[1])
    return index === null ? null : { mode: 'indirect', index }
  }

  return null
}

export function parseLabel(args: string): string | null {
  return LABEL_PATTERN.test(args) ? args : null
}

export function formatCommandValue(operand: CommandValue): string {
  return operand.mode === 'literal'
    ? String(operand.index)
    : `[${operand.index}]`
}
