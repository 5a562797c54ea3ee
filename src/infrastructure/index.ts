/**
 * Infrastructure Module
 *
 * Container provisioning and datastore initialization
 */

export { detectContainerRuntime, ensureNetwork, listContainers, runCommand, type CommandRunner, type ContainerRuntime } from './containers'

export { NETWORK_NAME, containerSpecs } from './catalog'

export { startContainers, type OrchestrationReport, type ContainerOutcome, type ContainerState } from './orchestrator'

export { setupTimescale, connectPostgres, type SqlExecutor } from './timescale'

export { setupMongo, connectMongo, type MongoConnection, type DocumentDatabase } from './mongo'

export { setupRedis, connectRedis, type KeyValueClient } from './redis'

export { SetupManager, createSetupManager, exitCodeFor, type SetupReporter, type SetupReport, type SetupDependencies } from './manager'
