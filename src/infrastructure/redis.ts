/**
 * Redis Initializer
 *
 * Registers key prefixes, announces each pub/sub channel and stores
 * application metadata.
 */

import { Redis } from 'ioredis'
import type { RedisConfig } from '../config'
import { NETWORK_ERROR_CODES, errorCode, errorMessage, storeFailure, type SetupErrorKind } from '../errors'
import type { LoggerInstance } from '../log'
import type { StoreResult } from '../types'

export const APP_VERSION = '1.0.0'

export const KEY_PREFIXES = {
  cache: 'llamaspace:cache:',
  session: 'llamaspace:session:',
  queue: 'llamaspace:queue:',
  lock: 'llamaspace:lock:',
  rate_limit: 'llamaspace:rate_limit:',
  pub_sub: 'llamaspace:pubsub:',
} as const

export const PUBSUB_CHANNELS = [
  'telemetry_stream',
  'command_stream',
  'alert_stream',
  'status_updates',
  'user_notifications',
] as const

export const KEY_PREFIXES_KEY = 'llamaspace:config:key_prefixes'
export const APP_CONFIG_KEY = 'llamaspace:config:app'

export interface KeyValueClient {
  ping(): Promise<string>
  hset(key: string, mapping: Record<string, string>): Promise<number>
  publish(channel: string, message: string): Promise<number>
  quit(): Promise<void>
}

export interface RedisOptions {
  logger: LoggerInstance
  environment: string
  connect?: (config: RedisConfig, logger: LoggerInstance) => Promise<KeyValueClient>
  /** Milliseconds since the epoch */
  now?: () => number
}

export interface ChannelInitMessage {
  type: 'system'
  message: string
  timestamp: number
}

export function classifyRedisError(error: unknown): SetupErrorKind {
  const code = errorCode(error)
  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) return 'connection'

  const message = errorMessage(error)
  if (/^(NOAUTH|WRONGPASS)|Connection is closed|max retries|ECONNREFUSED/i.test(message)) return 'connection'
  return 'unexpected'
}

/**
 * Connect without retrying; a password is only sent when one is configured
 */
export async function connectRedis(config: RedisConfig, logger: LoggerInstance): Promise<KeyValueClient> {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    lazyConnect: true,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
  })
  // connect() only rejects with "Connection is closed."; the socket error
  // arrives on the 'error' event first
  let socketError: Error | undefined
  client.on('error', (error: Error) => {
    socketError = error
    logger.debug('Redis client error', { error: error.message })
  })

  try {
    await client.connect()
  } catch (error) {
    client.disconnect()
    throw socketError ?? error
  }

  return {
    ping: () => client.ping(),
    hset: (key, mapping) => client.hset(key, mapping),
    publish: (channel, message) => client.publish(channel, message),
    async quit() {
      await client.quit()
    },
  }
}

export function channelName(channel: string): string {
  return `${KEY_PREFIXES.pub_sub}${channel}`
}

/**
 * Initialize Redis
 */
export async function setupRedis(config: RedisConfig, options: RedisOptions): Promise<StoreResult> {
  const { logger, environment, connect = connectRedis, now = Date.now } = options
  let client: KeyValueClient | undefined

  try {
    client = await connect(config, logger)
    await client.ping()

    await client.hset(KEY_PREFIXES_KEY, { ...KEY_PREFIXES })
    logger.debug('Key prefixes stored', { key: KEY_PREFIXES_KEY, count: Object.keys(KEY_PREFIXES).length })

    for (const channel of PUBSUB_CHANNELS) {
      const message: ChannelInitMessage = {
        type: 'system',
        message: `Channel ${channel} initialized`,
        timestamp: now() / 1000,
      }
      await client.publish(channelName(channel), JSON.stringify(message))
    }
    logger.debug('Pub/sub channels initialized', { channels: PUBSUB_CHANNELS.length })

    await client.hset(APP_CONFIG_KEY, {
      version: APP_VERSION,
      environment,
      initialized_at: String(Math.floor(now() / 1000)),
    })

    logger.info('Redis initialized successfully')
    return { store: 'redis', success: true }
  } catch (error) {
    return storeFailure('redis', error, classifyRedisError, logger)
  } finally {
    await client?.quit().catch((error: unknown) => {
      logger.debug('Error closing Redis connection', { error: errorMessage(error) })
    })
  }
}
