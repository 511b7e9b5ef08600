import {
  type CommandKeyword,
  charValue,
  indirect,
  intValue,
  literal,
  type Problem,
  RUN_ERRORS,
  VALIDATION_ERRORS,
  type Value,
} from '@hrm/types'
import { describe, expect, it } from 'vitest'
import { HALT_REASONS } from '../config'
import { ProblemBuilder } from '../problem'
import { Program, ProgramBuilder } from '../program'

function buildProblem(
  ios: Array<[Value[], Value[]]>,
  memory: Array<Value | null> = [],
  commands?: CommandKeyword[],
): Problem {
  const builder = new ProblemBuilder().memorySize(memory.length)
  if (commands === undefined) {
    builder.enableAllCommands()
  } else {
    commands.forEach((keyword) => builder.enableCommand(keyword))
  }
  for (const [input, output] of ios) {
    builder.addIo(input, output)
  }
  memory.forEach((cell, index) => {
    if (cell !== null) builder.addMemorySlot(index, cell)
  })

  const [error, problem] = builder.build()
  if (error) throw error
  return problem
}

/** a: INBOX / OUTBOX / JUMP a */
function echoLoop(): Program {
  return new ProgramBuilder()
    .addLabel('a')
    .addCommand({ keyword: 'INBOX' })
    .addCommand({ keyword: 'OUTBOX' })
    .addCommand({ keyword: 'JUMP', label: 'a' })
    .build()
}

describe('Program', () => {
  describe('ProgramBuilder', () => {
    it('should bind labels to the next command', () => {
      const program = new ProgramBuilder()
        .addLabel('start')
        .addCommand({ keyword: 'INBOX' })
        .addLabel('end')
        .build()

      expect(program.size).toBe(1)
      expect(program.getLabel('start')).toBe(0)
      expect(program.getLabel('end')).toBe(1)
      expect(program.getLabel('missing')).toBeUndefined()
    })

    it('should move a redeclared label to its later position', () => {
      const program = new ProgramBuilder()
        .addLabel('a')
        .addCommand({ keyword: 'INBOX' })
        .addLabel('a')
        .addCommand({ keyword: 'OUTBOX' })
        .build()

      expect(program.getLabel('a')).toBe(1)
    })
  })

  describe('validate', () => {
    const counterLoop = new ProgramBuilder()
      .addLabel('a')
      .addCommand({ keyword: 'INBOX' })
      .addCommand({ keyword: 'JUMPZ', label: 'b' })
      .addCommand({ keyword: 'BUMPDN', operand: indirect(0) })
      .addCommand({ keyword: 'JUMP', label: 'a' })
      .addLabel('b')
      .addCommand({ keyword: 'OUTBOX' })
      .build()

    it('should accept a program that fits the problem', () => {
      const problem = buildProblem([[[], []]], [intValue(0)])
      expect(counterLoop.validate(problem)).toEqual([undefined, undefined])
    })

    it('should reject a memory index beyond the memory size', () => {
      const problem = buildProblem([[[], []]])
      const [error] = counterLoop.validate(problem)
      expect(error?.detail).toEqual({
        code: VALIDATION_ERRORS.COMMAND_INDEX,
        index: 0,
      })
    })

    it('should reject a command the problem does not enable', () => {
      const problem = buildProblem([[[], []]], [], ['INBOX', 'OUTBOX'])
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'INBOX' })
        .addCommand({ keyword: 'ADD', operand: literal(0) })
        .build()

      const [error] = program.validate(problem)
      expect(error?.detail).toEqual({
        code: VALIDATION_ERRORS.COMMAND_NOT_AVAILABLE,
        keyword: 'ADD',
      })
      expect(error?.message).toBe('Command ADD is not available')
    })

    it('should reject a jump to an undeclared label', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'JUMPN', label: 'out' })
        .build()

      const [error] = program.validate(buildProblem([[[], []]]))
      expect(error?.detail).toEqual({
        code: VALIDATION_ERRORS.MISSING_LABEL,
        label: 'out',
      })
    })

    it('should reject a label bound past the end of the program', () => {
      const program = new Program([{ keyword: 'INBOX' }], new Map([['x', 5]]))

      const [error] = program.validate(buildProblem([[[], []]]))
      expect(error?.detail).toEqual({
        code: VALIDATION_ERRORS.LABEL_INDEX,
        label: 'x',
        index: 5,
      })
    })

    it('should report the first violation in program order', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'COPYFROM', operand: literal(9) })
        .addCommand({ keyword: 'JUMP', label: 'missing' })
        .build()

      const [error] = program.validate(buildProblem([[[], []]]))
      expect(error?.code).toBe(VALIDATION_ERRORS.COMMAND_INDEX)
    })
  })

  describe('run', () => {
    it('should stop at the end of the program without adjusting steps', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'INBOX' })
        .addCommand({ keyword: 'OUTBOX' })
        .build()
      const problem = buildProblem([[[intValue(5)], [intValue(5)]]])

      const [error, result] = program.runCase(
        { input: [intValue(5)], output: [intValue(5)] },
        problem.memory,
      )
      expect(error).toBeUndefined()
      expect(result).toEqual({
        steps: 2,
        haltReason: HALT_REASONS.END_OF_PROGRAM,
      })

      expect(program.run(problem)).toEqual([
        undefined,
        { size: 2, speedMin: 2, speedMax: 2, speedAvg: 2 },
      ])
    })

    it('should not count the INBOX that finds the input empty', () => {
      const problem = buildProblem([[[intValue(5)], [intValue(5)]]])

      const [, result] = echoLoop().runCase(
        { input: [intValue(5)], output: [intValue(5)] },
        problem.memory,
      )
      expect(result).toEqual({
        steps: 3,
        haltReason: HALT_REASONS.INPUT_EXHAUSTED,
      })
    })

    it('should score every IO case', () => {
      const problem = buildProblem([
        [
          [intValue(1), charValue('B')],
          [intValue(1), charValue('B')],
        ],
        [[intValue(3)], [intValue(3)]],
      ])

      expect(echoLoop().run(problem)).toEqual([
        undefined,
        { size: 3, speedMin: 3, speedMax: 6, speedAvg: 4.5 },
      ])
    })

    it('should count down through memory', () => {
      const program = new ProgramBuilder()
        .addLabel('a')
        .addCommand({ keyword: 'INBOX' })
        .addLabel('b')
        .addCommand({ keyword: 'OUTBOX' })
        .addCommand({ keyword: 'JUMPZ', label: 'a' })
        .addCommand({ keyword: 'COPYTO', operand: literal(0) })
        .addCommand({ keyword: 'BUMPDN', operand: literal(0) })
        .addCommand({ keyword: 'JUMP', label: 'b' })
        .build()
      const problem = buildProblem(
        [[[intValue(2)], [intValue(2), intValue(1), intValue(0)]]],
        [null],
      )

      expect(program.validate(problem)[0]).toBeUndefined()
      expect(program.run(problem)).toEqual([
        undefined,
        { size: 6, speedMin: 13, speedMax: 13, speedAvg: 13 },
      ])
    })

    it('should fail when the program stops before producing every output', () => {
      const program = new ProgramBuilder().addCommand({ keyword: 'INBOX' }).build()
      const problem = buildProblem([[[intValue(1)], [intValue(1)]]])

      const [error] = program.run(problem)
      expect(error?.detail).toEqual({
        code: RUN_ERRORS.INCORRECT_OUTPUT,
        expected: intValue(1),
        actual: null,
      })
    })

    it('should abort on the first failing case', () => {
      const problem = buildProblem([
        [[intValue(1)], [intValue(2)]],
        [[intValue(3)], [intValue(3)]],
      ])

      const [error, score] = echoLoop().run(problem)
      expect(score).toBeUndefined()
      expect(error?.detail).toEqual({
        code: RUN_ERRORS.INCORRECT_OUTPUT,
        expected: intValue(2),
        actual: intValue(1),
      })
    })

    it('should reject a character used as an index', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'INBOX' })
        .addCommand({ keyword: 'ADD', operand: indirect(0) })
        .addCommand({ keyword: 'OUTBOX' })
        .build()
      const problem = buildProblem(
        [[[intValue(1)], [intValue(1)]]],
        [charValue('A')],
      )

      expect(program.validate(problem)[0]).toBeUndefined()
      const [error] = program.run(problem)
      expect(error?.code).toBe(RUN_ERRORS.CHAR_USED_AS_INDEX)
    })

    it('should surface an unknown label when run without validation', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'JUMP', label: 'nowhere' })
        .build()

      const [error] = program.run(buildProblem([[[], []]]))
      expect(error?.detail).toEqual({
        code: RUN_ERRORS.UNKNOWN_LABEL,
        label: 'nowhere',
      })
    })

    it('should surface an out of range index when run without validation', () => {
      const program = new ProgramBuilder()
        .addCommand({ keyword: 'COPYFROM', operand: literal(3) })
        .build()

      const [error] = program.run(buildProblem([[[], []]]))
      expect(error?.detail).toEqual({
        code: RUN_ERRORS.INDEX_OUT_OF_RANGE,
        value: intValue(3),
      })
    })

    it('should start every case from the memory template', () => {
      const program = new ProgramBuilder()
        .addLabel('a')
        .addCommand({ keyword: 'INBOX' })
        .addCommand({ keyword: 'ADD', operand: literal(0) })
        .addCommand({ keyword: 'COPYTO', operand: literal(0) })
        .addCommand({ keyword: 'OUTBOX' })
        .addCommand({ keyword: 'JUMP', label: 'a' })
        .build()
      const problem = buildProblem(
        [
          [[intValue(1), intValue(1)], [intValue(11), intValue(12)]],
          [[intValue(5)], [intValue(15)]],
        ],
        [intValue(10)],
      )

      const first = program.run(problem)
      const second = program.run(problem)

      expect(first).toEqual([
        undefined,
        { size: 5, speedMin: 5, speedMax: 10, speedAvg: 7.5 },
      ])
      expect(second).toEqual(first)
      expect(problem.memory).toEqual([intValue(10)])
    })
  })

  describe('step limit', () => {
    it('should stop a program that never halts', () => {
      const program = new ProgramBuilder()
        .addLabel('a')
        .addCommand({ keyword: 'JUMP', label: 'a' })
        .build()

      const [error] = program.run(buildProblem([[[], []]]), { maxSteps: 10 })
      expect(error?.detail).toEqual({
        code: RUN_ERRORS.STEP_LIMIT_EXCEEDED,
        limit: 10,
      })
    })

    it('should allow a case that needs exactly the limit', () => {
      const problem = buildProblem([[[intValue(5)], [intValue(5)]]])
      const [error, score] = echoLoop().run(problem, { maxSteps: 3 })

      expect(error).toBeUndefined()
      expect(score?.speedMax).toBe(3)
    })

    it('should fail a case that needs one step more', () => {
      const problem = buildProblem([[[intValue(5)], [intValue(5)]]])
      const [error] = echoLoop().run(problem, { maxSteps: 2 })

      expect(error?.code).toBe(RUN_ERRORS.STEP_LIMIT_EXCEEDED)
    })
  })

  describe('format', () => {
    it('should list labels before the command they bind to', () => {
      const program = new ProgramBuilder()
        .addLabel('a')
        .addCommand({ keyword: 'INBOX' })
        .addCommand({ keyword: 'COPYTO', operand: indirect(2) })
        .addCommand({ keyword: 'JUMPZ', label: 'a' })
        .addLabel('b')
        .build()

      expect(program.format()).toBe('a:\nINBOX\nCOPYTO [2]\nJUMPZ a\nb:')
    })
  })
})
