/**
 * Shared types for the setup pipeline
 */

import type { SetupError } from './errors'

export type StoreName = 'timescaledb' | 'mongodb' | 'redis'

/** Stores in the order they are initialized */
export const STORE_ORDER: readonly StoreName[] = ['timescaledb', 'mongodb', 'redis']

export const STORE_LABELS: Record<StoreName, string> = {
  timescaledb: 'TimescaleDB',
  mongodb: 'MongoDB',
  redis: 'Redis',
}

/**
 * Outcome of one store initializer
 */
export interface StoreResult {
  store: StoreName
  success: boolean
  error?: SetupError
}

export interface ContainerSpec {
  name: string
  image: string
  network?: string
  env?: Record<string, string>
  ports?: { host: number; container: number }[]
  volumes?: { name: string; path: string }[]
  /** Arguments passed after the image name */
  command?: string[]
}
