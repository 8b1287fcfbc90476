#!/usr/bin/env tsx

import { logger } from '@symcode/core'
import { loadCliEnv } from './env'
import { createProgram } from './program'

// Initialize logger
logger.init()

const [envError, env] = loadCliEnv()
if (envError) {
  logger.error('Failed to load environment:', envError)
  process.exit(1)
}
logger.setLevel(env.LOG_LEVEL)

createProgram(env).parse()
