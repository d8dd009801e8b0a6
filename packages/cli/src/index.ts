#!/usr/bin/env tsx

import { logger } from '@heappack/core'
import { createProgram } from './program'

logger.init()

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('heappack failed', error)
    process.exitCode = 1
  })
