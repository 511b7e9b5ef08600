/**
 * Instruction Set Types
 *
 * The keyword tuples below are the single source of truth for the
 * instruction set: the command union, the availability checks and the
 * handler table are all derived from them.
 */

export const IO_KEYWORDS = ['INBOX', 'OUTBOX'] as const

export const MEMORY_KEYWORDS = [
  'COPYFROM',
  'COPYTO',
  'ADD',
  'SUB',
  'BUMPUP',
  'BUMPDN',
] as const

export const JUMP_KEYWORDS = ['JUMP', 'JUMPZ', 'JUMPN'] as const

export const COMMAND_KEYWORDS = [
  ...IO_KEYWORDS,
  ...MEMORY_KEYWORDS,
  ...JUMP_KEYWORDS,
] as const

export type IoKeyword = (typeof IO_KEYWORDS)[number]
export type MemoryKeyword = (typeof MEMORY_KEYWORDS)[number]
export type JumpKeyword = (typeof JUMP_KEYWORDS)[number]
export type CommandKeyword = (typeof COMMAND_KEYWORDS)[number]

/**
 * Addressing mode of a memory operand
 * - literal: `COPYFROM 3` touches cell 3
 * - indirect: `COPYFROM [3]` touches the cell whose index is stored in cell 3
 */
export type CommandValue =
  | { mode: 'literal'; index: number }
  | { mode: 'indirect'; index: number }

export interface IoCommand<K extends IoKeyword = IoKeyword> {
  keyword: K
}

export interface MemoryCommand<K extends MemoryKeyword = MemoryKeyword> {
  keyword: K
  operand: CommandValue
}

export interface JumpCommand<K extends JumpKeyword = JumpKeyword> {
  keyword: K
  label: string
}

type Distribute<Keys extends CommandKeyword> = {
  [K in Keys]: K extends IoKeyword
    ? IoCommand<K>
    : K extends MemoryKeyword
      ? MemoryCommand<K>
      : K extends JumpKeyword
        ? JumpCommand<K>
        : never
}[Keys]

export type Command = Distribute<CommandKeyword>

/** Command variant for a given keyword */
export type CommandOf<K extends CommandKeyword> = Extract<Command, { keyword: K }>

const KEYWORD_SET: ReadonlySet<string> = new Set(COMMAND_KEYWORDS)

export function isCommandKeyword(keyword: string): keyword is CommandKeyword {
  return KEYWORD_SET.has(keyword)
}

export function literal(index: number): CommandValue {
  return { mode: 'literal', index }
}

export function indirect(index: number): CommandValue {
  return { mode: 'indirect', index }
}
