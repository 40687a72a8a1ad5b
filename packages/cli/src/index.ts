import { logger } from '@zcl/core'
import { loadCliEnv } from './env'
import { createProgram } from './program'

const env = loadCliEnv()
logger.init(env.LOG_LEVEL)

createProgram(env)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed:', error)
    process.exit(1)
  })
