import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { charValue, intValue } from '@hrm/types'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { loadProblem, readTextFile } from '../utils/files'

describe('File utilities', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'hrm-cli-'))
    writeFileSync(
      join(dir, 'problem.json'),
      JSON.stringify({
        ios: [{ input: [1, 'A'], output: ['A'] }],
        memory: { partial: { dim: 2, values: { '1': 7 } } },
        commands: ['INBOX', 'OUTBOX', 'COPYFROM'],
      }),
    )
    writeFileSync(join(dir, 'broken.json'), '{"ios":')
    writeFileSync(join(dir, 'solution.hrm'), 'INBOX\nOUTBOX\n')
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should read a text file', () => {
    expect(readTextFile(join(dir, 'solution.hrm'))).toEqual([
      undefined,
      'INBOX\nOUTBOX\n',
    ])
  })

  it('should report a missing file', () => {
    const path = join(dir, 'missing.hrm')
    const [error] = readTextFile(path)
    expect(error?.message).toBe(`File not found: ${path}`)
  })

  it('should return the read failure instead of throwing', () => {
    const [error, text] = readTextFile(dir)

    expect(text).toBeUndefined()
    expect(error).toBeInstanceOf(Error)
    expect(error?.message).toContain('EISDIR')
  })

  it('should load a problem definition', () => {
    const [error, problem] = loadProblem(join(dir, 'problem.json'))

    expect(error).toBeUndefined()
    expect(problem?.ios).toEqual([
      { input: [intValue(1), charValue('A')], output: [charValue('A')] },
    ])
    expect(problem?.memory).toEqual([null, intValue(7)])
    expect([...(problem?.availableCommands ?? [])]).toEqual([
      'INBOX',
      'OUTBOX',
      'COPYFROM',
    ])
  })

  it('should name the file of an invalid problem', () => {
    const path = join(dir, 'broken.json')
    const [error] = loadProblem(path)
    expect(error?.message.startsWith(`Invalid problem ${path}: Failed to parse JSON`)).toBe(true)
  })
})
