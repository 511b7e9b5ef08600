/**
 * Source Compiler
 *
 * Line-oriented translation of solution text into a Program. Each trimmed
 * line is classified by the first matching rule:
 *
 * 1. blank line
 * 2. `-- ... --` commented-out code
 * 3. `COMMENT <n>` pragma
 * 4. `DEFINE COMMENT|LABEL <n>`, which starts the drawing data: it and
 *    every following line are skipped
 * 5. `label:` declaration
 * 6. `KEYWORD [args]` instruction
 *
 * Anything else aborts compilation with an illegal line error.
 */

import {
  COMPILE_ERRORS,
  CompileError,
  type Safe,
  safeError,
  safeResult,
} from '@hrm/types'
import { InstructionRegistry, type Program, ProgramBuilder } from '@hrm/vm'

const COMMENT_PATTERN = /^COMMENT\s+\d+$/
const DEFINE_PATTERN = /^DEFINE\s+(COMMENT|LABEL)\s+\d+$/
const LABEL_PATTERN = /^([a-z]+):$/
const INSTRUCTION_PATTERN = /^([A-Z]+)(?:\s+(.*))?$/

function isCommentedCode(line: string): boolean {
  return line.startsWith('--') && line.endsWith('--')
}

export function compile(source: string): Safe<Program, CompileError> {
  const registry = InstructionRegistry.getInstance()
  const builder = new ProgramBuilder()
  const lines = source.split(/\r?\n/)

  for (const [offset, rawLine] of lines.entries()) {
    const line = rawLine.trim()
    const illegal = (): Safe<Program, CompileError> =>
      safeError(
        new CompileError({
          code: COMPILE_ERRORS.ILLEGAL_LINE,
          line,
          lineNumber: offset + 1,
        }),
      )

    if (line === '' || isCommentedCode(line)) continue
    if (COMMENT_PATTERN.test(line)) continue
    if (DEFINE_PATTERN.test(line)) break

    const labelMatch = LABEL_PATTERN.exec(line)
    if (labelMatch?.[1] !== undefined) {
      builder.addLabel(labelMatch[1])
      continue
    }

    const instructionMatch = INSTRUCTION_PATTERN.exec(line)
    const keyword = instructionMatch?.[1]
    if (keyword === undefined || !registry.hasHandler(keyword)) {
      return illegal()
    }

    const command = registry.getHandler(keyword).parse(instructionMatch?.[2] ?? '')
    if (command === null) {
      return illegal()
    }
    builder.addCommand(command)
  }

  return safeResult(builder.build())
}
