import { loadHrmEnv, logger } from '@hrm/core'
import { Command } from 'commander'
import { createCompileCommand } from './commands/compile'
import { createRunCommand } from './commands/run'
import { createValidateCommand } from './commands/validate'

export const CLI_VERSION = '0.1.0'

export function createCli(): Command {
  return new Command('hrm')
    .description('Compile, validate and score HRM solutions')
    .version(CLI_VERSION)
    .addCommand(createRunCommand())
    .addCommand(createValidateCommand())
    .addCommand(createCompileCommand())
}

/**
 * Configure from the environment, then dispatch. An invalid environment
 * rejects like any other failure.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  // Load environment variables (.env included)
  const env = loadHrmEnv()

  // Initialize logger
  logger.setLevel(env.LOG_LEVEL)
  logger.init()

  await createCli().parseAsync(argv)
}
