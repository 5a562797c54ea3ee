/**
 * Container Catalog
 *
 * The three datastore containers and the network they share
 */

import type { SetupConfig } from '../config'
import type { ContainerSpec, StoreName } from '../types'

export const NETWORK_NAME = 'llamaspace-network'

export const CONTAINER_IMAGES: Record<StoreName, string> = {
  timescaledb: 'timescale/timescaledb:latest-pg14',
  mongodb: 'mongo:latest',
  redis: 'redis:latest',
}

export const CONTAINER_NAMES: Record<StoreName, string> = {
  timescaledb: 'llamaspace-timescaledb',
  mongodb: 'llamaspace-mongodb',
  redis: 'llamaspace-redis',
}

/**
 * Container definitions for the configured credentials and host ports
 */
export function containerSpecs(config: SetupConfig): Record<StoreName, ContainerSpec> {
  const { postgres, mongo, redis } = config

  const redisSpec: ContainerSpec = {
    name: CONTAINER_NAMES.redis,
    image: CONTAINER_IMAGES.redis,
    network: NETWORK_NAME,
    ports: [{ host: redis.port, container: 6379 }],
    volumes: [{ name: 'llamaspace-redis-data', path: '/data' }],
  }
  if (redis.password) {
    redisSpec.env = { REDIS_PASSWORD: redis.password }
    redisSpec.command = ['--requirepass', redis.password]
  }

  return {
    timescaledb: {
      name: CONTAINER_NAMES.timescaledb,
      image: CONTAINER_IMAGES.timescaledb,
      network: NETWORK_NAME,
      env: {
        POSTGRES_USER: postgres.user,
        POSTGRES_PASSWORD: postgres.password,
        POSTGRES_DB: postgres.database,
      },
      ports: [{ host: postgres.port, container: 5432 }],
      volumes: [{ name: 'llamaspace-timescaledb-data', path: '/var/lib/postgresql/data' }],
    },
    mongodb: {
      name: CONTAINER_NAMES.mongodb,
      image: CONTAINER_IMAGES.mongodb,
      network: NETWORK_NAME,
      env: mongo.user && mongo.password
        ? { MONGO_INITDB_ROOT_USERNAME: mongo.user, MONGO_INITDB_ROOT_PASSWORD: mongo.password }
        : {},
      ports: [{ host: mongo.port, container: 27017 }],
      volumes: [{ name: 'llamaspace-mongodb-data', path: '/data/db' }],
    },
    redis: redisSpec,
  }
}
