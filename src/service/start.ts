#!/usr/bin/env node
import { createLogger } from '../utils/logger.js'
import { main } from './main.js'

const logger = createLogger('service')

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed')
  process.exitCode = 1
})
