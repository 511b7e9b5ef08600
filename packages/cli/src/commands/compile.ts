import { logger } from '@hrm/core'
import { compile } from '@hrm/compiler'
import type { Program } from '@hrm/vm'
import { Command } from 'commander'
import { readTextFile } from '../utils/files'

/**
 * Summary line followed by the canonical listing, logged as one entry
 */
export function formatCompileReport(program: Program): string {
  const header = `Compiled ${program.size} instructions`
  const listing = program.format()
  return listing === '' ? header : `${header}\n${listing}`
}

export function createCompileCommand(): Command {
  const command = new Command('compile')
    .description('Compile a solution and print its canonical listing')
    .argument('<solution>', 'Solution source file')
    .action((solutionFile: string) => {
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

      logger.info(formatCompileReport(program))
    })

  return command
}
