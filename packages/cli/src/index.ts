#!/usr/bin/env tsx

import { logger } from '@hrm/core'
import { runCli } from './cli'

runCli(process.argv).catch((error: unknown) => {
  logger.error('Unhandled error:', error)
  process.exit(1)
})
