/**
 * Setup Manager
 *
 * Runs the provisioning pipeline in order: containers, data directories,
 * then each store. A failing store never stops the ones after it.
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { MongoConfig, PostgresConfig, RedisConfig, SetupConfig } from '../config'
import { SetupError, errorMessage } from '../errors'
import type { LoggerInstance } from '../log'
import { STORE_ORDER, type StoreName, type StoreResult } from '../types'
import { NETWORK_NAME, containerSpecs } from './catalog'
import type { CommandRunner } from './containers'
import { setupMongo, type MongoConnection } from './mongo'
import { startContainers, type OrchestrationReport } from './orchestrator'
import { setupRedis, type KeyValueClient } from './redis'
import { setupTimescale, type SqlExecutor } from './timescale'

/**
 * Receives progress as the pipeline runs
 */
export interface SetupReporter {
  containersStarting(): void
  containersWaiting(ms: number): void
  containersFinished(report: OrchestrationReport): void
  storeStarting(store: StoreName): void
  storeFinished(result: StoreResult): void
  finished(report: SetupReport): void
}

export interface SetupReport {
  containers: OrchestrationReport
  results: StoreResult[]
  exitCode: number
}

/**
 * Replaceable edges of the pipeline; the defaults talk to Docker and the
 * real databases.
 */
export interface SetupDependencies {
  logger: LoggerInstance
  run?: CommandRunner
  sleep?: (ms: number) => Promise<void>
  connectPostgres?: (config: PostgresConfig, logger: LoggerInstance) => SqlExecutor
  connectMongo?: (config: MongoConfig) => Promise<MongoConnection>
  connectRedis?: (config: RedisConfig, logger: LoggerInstance) => Promise<KeyValueClient>
  now?: () => number
}

/**
 * 0 when every store initialized, 1 otherwise
 */
export function exitCodeFor(results: StoreResult[]): number {
  return results.length > 0 && results.every(result => result.success) ? 0 : 1
}

export class SetupManager {
  private config: SetupConfig
  private deps: SetupDependencies

  constructor(config: SetupConfig, deps: SetupDependencies) {
    this.config = config
    this.deps = deps
  }

  /**
   * Start (or find) the datastore containers
   */
  async provisionContainers(reporter?: SetupReporter): Promise<OrchestrationReport> {
    return startContainers(containerSpecs(this.config), {
      network: NETWORK_NAME,
      readinessDelayMs: this.config.readinessDelayMs,
      logger: this.deps.logger.child({ stage: 'containers' }),
      run: this.deps.run,
      sleep: this.deps.sleep,
      onWaiting: reporter && ((ms) => reporter.containersWaiting(ms)),
    })
  }

  /**
   * Create data/, data/db/ and data/samples/ under the project root
   */
  async prepareDirectories(): Promise<void> {
    const { data, samples } = this.config.paths
    for (const dir of [data, join(data, 'db'), samples]) {
      await mkdir(dir, { recursive: true })
    }
  }

  /**
   * Initialize one store. Never rejects: failures come back as results.
   */
  async initialize(store: StoreName): Promise<StoreResult> {
    const logger = this.deps.logger.child({ store })
    const { now } = this.deps

    try {
      switch (store) {
        case 'timescaledb':
          return await setupTimescale(this.config.postgres, { logger, connect: this.deps.connectPostgres })
        case 'mongodb':
          return await setupMongo(this.config.mongo, {
            logger,
            samplesDir: this.config.paths.samples,
            connect: this.deps.connectMongo,
            now: now && (() => new Date(now())),
          })
        case 'redis':
          return await setupRedis(this.config.redis, {
            logger,
            environment: this.config.environment,
            connect: this.deps.connectRedis,
            now,
          })
      }
    } catch (error) {
      const setupError = new SetupError('unexpected', errorMessage(error), { store, cause: error })
      logger.error(setupError.message)
      return { store, success: false, error: setupError }
    }
  }

  /**
   * Run the whole pipeline
   */
  async run(reporter: SetupReporter): Promise<SetupReport> {
    reporter.containersStarting()
    const containers = await this.provisionContainers(reporter)
    reporter.containersFinished(containers)

    try {
      await this.prepareDirectories()
    } catch (error) {
      this.deps.logger.warn('Could not create data directories', { error: errorMessage(error) })
    }

    const results: StoreResult[] = []
    for (const store of STORE_ORDER) {
      reporter.storeStarting(store)
      const result = await this.initialize(store)
      reporter.storeFinished(result)
      results.push(result)
    }

    const report: SetupReport = { containers, results, exitCode: exitCodeFor(results) }
    reporter.finished(report)
    return report
  }
}

export function createSetupManager(config: SetupConfig, deps: SetupDependencies): SetupManager {
  return new SetupManager(config, deps)
}
