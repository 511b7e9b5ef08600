import { loadHrmEnv, logger } from '@hrm/core'
import { Command } from 'commander'
import { loadProblem, readTextFile } from '../utils/files'
import { evaluateSolution } from '../utils/evaluate'
import { parseStepLimit } from '../utils/validation'

interface RunCommandOptions {
  maxSteps?: number
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Compile a solution, validate it and run every IO case')
    .argument('<problem.json>', 'Problem definition file')
    .argument('<solution>', 'Solution source file')
    .option(
      '--max-steps <n>',
      'Fail an IO case after this many steps (overrides HRM_MAX_STEPS)',
      parseStepLimit,
    )
    .action(
      (problemFile: string, solutionFile: string, options: RunCommandOptions) => {
        executeRunCommand(problemFile, solutionFile, options)
      },
    )

  return command
}

function executeRunCommand(
  problemFile: string,
  solutionFile: string,
  options: RunCommandOptions,
): void {
  const env = loadHrmEnv()
  const maxSteps = options.maxSteps ?? env.HRM_MAX_STEPS

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

  const [error, score] = evaluateSolution(problem, source, { maxSteps })
  if (error) {
    logger.error(`${error.name}: ${error.message}`, error.detail)
    process.exit(1)
  }

  logger.info('All IO cases passed')
  logger.info(`Size: ${score.size}`)
  logger.info(
    `Speed: min ${score.speedMin}, max ${score.speedMax}, avg ${score.speedAvg.toFixed(2)}`,
  )
}
