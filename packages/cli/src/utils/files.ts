import { existsSync, readFileSync } from 'node:fs'
import { parseProblemDefinition } from '@hrm/core'
import { type Problem, type Safe, safeError } from '@hrm/types'
import { problemFromDefinition } from '@hrm/vm'
import * as _ from 'radash'
import { isValidPath } from './validation'

export function readTextFile(path: string): Safe<string> {
  if (!isValidPath(path)) {
    return safeError(new Error(`Invalid file path: ${path}`))
  }
  if (!existsSync(path)) {
    return safeError(new Error(`File not found: ${path}`))
  }
  return _.try(() => readFileSync(path, 'utf-8'))()
}

/**
 * Read, validate and build the problem stored in a JSON file
 */
export function loadProblem(path: string): Safe<Problem> {
  const [readError, json] = readTextFile(path)
  if (readError) return safeError(readError)

  const [parseError, definition] = parseProblemDefinition(json)
  if (parseError) {
    return safeError(new Error(`Invalid problem ${path}: ${parseError.message}`))
  }

  return problemFromDefinition(definition)
}
