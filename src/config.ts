/**
 * Config - Setup Configuration
 *
 * Reads connection parameters from the environment into an explicit
 * SetupConfig that is handed to every stage.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env)
 * const sql = postgres(postgresUrl(config.postgres))
 * ```
 */

import { resolve } from 'node:path'
import { z } from 'zod'
import { SetupError } from './errors'
import type { LogLevel } from './log'

export interface PostgresConfig {
  host: string
  port: number
  user: string
  password: string
  database: string
}

export interface MongoConfig {
  host: string
  port: number
  /** Empty user or password means connecting without credentials */
  user: string
  password: string
  database: string
}

export interface RedisConfig {
  host: string
  port: number
  password?: string
}

export interface SetupConfig {
  environment: string
  postgres: PostgresConfig
  mongo: MongoConfig
  redis: RedisConfig
  paths: {
    root: string
    data: string
    samples: string
  }
  /** Pause after launching containers before connecting */
  readinessDelayMs: number
  log: {
    level: LogLevel
    format: 'pretty' | 'json'
  }
}

const DEFAULT_NAME = 'llamaspace'

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value)

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback))

const port = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(fallback))

const EnvSchema = z.object({
  POSTGRES_HOST: text('localhost'),
  POSTGRES_PORT: port(5432),
  POSTGRES_USER: text(DEFAULT_NAME),
  POSTGRES_PASSWORD: text(DEFAULT_NAME),
  POSTGRES_DB: text(DEFAULT_NAME),

  MONGO_HOST: text('localhost'),
  MONGO_PORT: port(27017),
  MONGO_USER: z.string().default(DEFAULT_NAME),
  MONGO_PASSWORD: z.string().default(DEFAULT_NAME),
  MONGO_DB: text(DEFAULT_NAME),

  REDIS_HOST: text('localhost'),
  REDIS_PORT: port(6379),
  REDIS_PASSWORD: z.string().default(''),

  ENVIRONMENT: text('development'),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info')),
  LOG_FORMAT: z.preprocess(blankToUndefined, z.enum(['pretty', 'json']).default('pretty')),
  SETUP_ROOT: z.preprocess(blankToUndefined, z.string().optional()),
  SETUP_READY_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(5000)),
})

/**
 * Build the setup configuration from environment variables
 *
 * @throws SetupError of kind 'config' when a value is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SetupConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw SetupError.config(`Invalid configuration: ${problems.join('; ')}`)
  }

  const vars = parsed.data
  const root = resolve(cwd, vars.SETUP_ROOT ?? '.')
  const data = resolve(root, 'data')

  return {
    environment: vars.ENVIRONMENT,
    postgres: {
      host: vars.POSTGRES_HOST,
      port: vars.POSTGRES_PORT,
      user: vars.POSTGRES_USER,
      password: vars.POSTGRES_PASSWORD,
      database: vars.POSTGRES_DB,
    },
    mongo: {
      host: vars.MONGO_HOST,
      port: vars.MONGO_PORT,
      user: vars.MONGO_USER,
      password: vars.MONGO_PASSWORD,
      database: vars.MONGO_DB,
    },
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD || undefined,
    },
    paths: {
      root,
      data,
      samples: resolve(data, 'samples'),
    },
    readinessDelayMs: vars.SETUP_READY_DELAY_MS,
    log: {
      level: vars.LOG_LEVEL,
      format: vars.LOG_FORMAT,
    },
  }
}

export function postgresUrl(config: PostgresConfig): string {
  const auth = `${encodeURIComponent(config.user)}:${encodeURIComponent(config.password)}`
  return `postgres://${auth}@${config.host}:${config.port}/${encodeURIComponent(config.database)}`
}

/**
 * Credentials are authenticated against the admin database, where the
 * container's root user lives.
 */
export function mongoUrl(config: MongoConfig): string {
  const database = encodeURIComponent(config.database)
  if (config.user && config.password) {
    const auth = `${encodeURIComponent(config.user)}:${encodeURIComponent(config.password)}`
    return `mongodb://${auth}@${config.host}:${config.port}/${database}?authSource=admin`
  }
  return `mongodb://${config.host}:${config.port}/${database}`
}
