#!/usr/bin/env node
/**
 * LlamaSpace Database Setup
 *
 * Starts the TimescaleDB, MongoDB and Redis containers when Docker is
 * available and initializes each store. Takes no flags; everything comes
 * from the environment (and .env).
 *
 * @example
 * ```bash
 * llamaspace-db-setup
 * REDIS_PASSWORD=test-secret LOG_LEVEL=debug llamaspace-db-setup
 * ```
 */

// .env must be applied before ./ui reads NO_COLOR and TERM
import 'dotenv/config'
import { loadConfig, type SetupConfig } from './config'
import { SetupError, errorMessage } from './errors'
import { createSetupManager } from './infrastructure'
import { Log, type LoggerInstance } from './log'
import { createConsoleReporter, printError, printHeader } from './ui'

function createLogger(config: SetupConfig): LoggerInstance {
  const builder = Log.create('db-setup')
    .level(config.log.level)
    .context({ environment: config.environment })
  if (config.log.format === 'pretty') {
    builder.prettyPrint()
  }
  return builder.console().build()
}

async function main(): Promise<number> {
  printHeader()

  let config: SetupConfig
  try {
    config = loadConfig()
  } catch (error) {
    if (error instanceof SetupError && error.kind === 'config') {
      printError('Invalid configuration', error.message)
      return 1
    }
    throw error
  }

  const logger = createLogger(config)
  const manager = createSetupManager(config, { logger })
  const report = await manager.run(createConsoleReporter())
  return report.exitCode
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    printError('Setup failed', errorMessage(error))
    process.exitCode = 1
  })
