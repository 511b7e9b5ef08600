import { logger } from '@hrm/core'
import { compile } from '@hrm/compiler'
import { Command } from 'commander'
import { loadProblem, readTextFile } from '../utils/files'

export function createValidateCommand(): Command {
  const command = new Command('validate')
    .description('Check a solution against a problem without running it')
    .argument('<problem.json>', 'Problem definition file')
    .argument('<solution>', 'Solution source file')
    .action((problemFile: string, solutionFile: string) => {
      const [problemError, problem] = loadProblem(problemFile)
      if (problemError) {
        logger.error('Failed to load problem', problemError)
        process.exit(1)
      }

      const [sourceError, source] = readTextFile(solutionFile)
      if (sourceError) {
        logger.error('Failed to read solution', sourceError)
        process.exit(1)
      }

      const [compileError, program] = compile(source)
      if (compileError) {
        logger.error(compileError.message, compileError.detail)
        process.exit(1)
      }

      const [validationError] = program.validate(problem)
      if (validationError) {
        logger.error(validationError.message, validationError.detail)
        process.exit(1)
      }

      logger.info(`Solution is valid (${program.size} instructions)`)
    })

  return command
}
