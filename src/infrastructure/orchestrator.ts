/**
 * Container Orchestrator
 *
 * Makes sure the datastore containers exist and are running. A missing
 * container engine or a failed docker command is never fatal: the stores
 * may already be running elsewhere.
 */

import type { LoggerInstance } from '../log'
import { errorMessage } from '../errors'
import { STORE_ORDER, type ContainerSpec, type StoreName } from '../types'
import {
  detectContainerRuntime,
  ensureNetwork,
  listContainers,
  runCommand,
  runContainerDocker,
  startContainer,
  type CommandRunner,
  type ContainerRuntime,
} from './containers'

export type ContainerState = 'running' | 'started' | 'created' | 'failed'

export interface ContainerOutcome {
  store: StoreName
  name: string
  state: ContainerState
  error?: string
}

export interface OrchestrationReport {
  runtime: ContainerRuntime
  /** False when the network already existed or could not be created */
  networkCreated: boolean
  containers: ContainerOutcome[]
  /** Time spent waiting for freshly launched containers */
  waitedMs: number
}

export interface OrchestratorOptions {
  network: string
  readinessDelayMs: number
  logger: LoggerInstance
  run?: CommandRunner
  sleep?: (ms: number) => Promise<void>
  /** Called once before the readiness pause */
  onWaiting?: (ms: number) => void
}

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms))

/**
 * Ensure the network and every container in `specs` are up
 */
export async function startContainers(
  specs: Record<StoreName, ContainerSpec>,
  options: OrchestratorOptions
): Promise<OrchestrationReport> {
  const { network, readinessDelayMs, logger, run = runCommand, sleep: wait = sleep, onWaiting } = options

  const runtime = await detectContainerRuntime(run)
  if (!runtime) {
    logger.debug('Docker not found. Assuming databases are already running.')
    return { runtime, networkCreated: false, containers: [], waitedMs: 0 }
  }

  let networkCreated = false
  try {
    networkCreated = await ensureNetwork(network, run)
    logger.debug(networkCreated ? 'Network created' : 'Network already exists', { network })
  } catch (error) {
    logger.warn('Could not create network', { network, error: errorMessage(error) })
  }

  let running: string[] = []
  let existing: string[] = []
  try {
    running = await listContainers(run)
    existing = await listContainers(run, { all: true })
  } catch (error) {
    logger.warn('Could not list containers', { error: errorMessage(error) })
  }

  const containers: ContainerOutcome[] = []
  for (const store of STORE_ORDER) {
    containers.push(await ensureContainer(store, specs[store], { running, existing, run, logger }))
  }

  const launched = containers.some(({ state }) => state === 'started' || state === 'created')
  if (!launched) {
    return { runtime, networkCreated, containers, waitedMs: 0 }
  }

  logger.debug('Waiting for databases to be ready...', { delayMs: readinessDelayMs })
  onWaiting?.(readinessDelayMs)
  await wait(readinessDelayMs)
  return { runtime, networkCreated, containers, waitedMs: readinessDelayMs }
}

async function ensureContainer(
  store: StoreName,
  spec: ContainerSpec,
  context: { running: string[]; existing: string[]; run: CommandRunner; logger: LoggerInstance }
): Promise<ContainerOutcome> {
  const { running, existing, run, logger } = context
  const { name } = spec

  if (running.includes(name)) {
    logger.debug('Container already running', { container: name })
    return { store, name, state: 'running' }
  }

  try {
    if (existing.includes(name)) {
      await startContainer(name, run)
      logger.debug('Container started', { container: name })
      return { store, name, state: 'started' }
    }

    await runContainerDocker(spec, run)
    logger.debug('Container created', { container: name, image: spec.image })
    return { store, name, state: 'created' }
  } catch (error) {
    const message = errorMessage(error)
    logger.error('Container command failed', { container: name, error: message })
    return { store, name, state: 'failed', error: message }
  }
}
