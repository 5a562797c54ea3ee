/**
 * TimescaleDB Initializer
 *
 * Creates the timescaledb extension, the telemetry tables, their
 * hypertables and indexes. Every statement is safe to re-run.
 */

import postgres from 'postgres'
import { postgresUrl, type PostgresConfig } from '../config'
import { NETWORK_ERROR_CODES, errorCode, errorMessage, storeFailure, tolerateConflict, type SetupErrorKind } from '../errors'
import type { LoggerInstance } from '../log'
import type { StoreResult } from '../types'
import { TABLES } from './timescale-schema'

export type Row = Record<string, unknown>

/**
 * Minimal SQL surface the initializer needs
 */
export interface SqlExecutor {
  query(text: string): Promise<Row[]>
  end(): Promise<void>
}

export interface TimescaleOptions {
  logger: LoggerInstance
  connect?: (config: PostgresConfig, logger: LoggerInstance) => SqlExecutor
}

/** SQLSTATEs raised when the object being created is already there */
const CONFLICT_CODES = new Set([
  '42P07', // duplicate_table (also indexes)
  '42710', // duplicate_object
  '42P06', // duplicate_schema
])

/** TimescaleDB's "table is already a hypertable" */
const HYPERTABLE_EXISTS = 'TS110'

const CONNECTION_CODES = new Set([
  ...NETWORK_ERROR_CODES,
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '28P01', // invalid_password
  '28000', // invalid_authorization_specification
  '3D000', // invalid_catalog_name
])

export function classifyPostgresError(error: unknown): SetupErrorKind {
  const code = errorCode(error)
  if (typeof code === 'string') {
    if (CONFLICT_CODES.has(code)) return 'conflict'
    if (CONNECTION_CODES.has(code) || code.startsWith('08')) return 'connection'
    return 'unexpected'
  }

  const message = errorMessage(error)
  if (/already exists/i.test(message)) return 'conflict'
  if (/connection refused|ECONNREFUSED|could not connect/i.test(message)) return 'connection'
  return 'unexpected'
}

/**
 * Hypertable conversion tolerates only an existing hypertable; any other
 * conflict means the table is not in the expected shape.
 */
export function classifyHypertableError(error: unknown): SetupErrorKind {
  if (errorCode(error) === HYPERTABLE_EXISTS || /already a hypertable/i.test(errorMessage(error))) {
    return 'conflict'
  }
  const kind = classifyPostgresError(error)
  return kind === 'conflict' ? 'unexpected' : kind
}

/**
 * Open a connection pool of one; notices (such as the one create_hypertable
 * raises for an existing hypertable) go to the debug log.
 */
export function connectPostgres(config: PostgresConfig, logger: LoggerInstance): SqlExecutor {
  const sql = postgres(postgresUrl(config), {
    max: 1,
    onnotice: (notice) => logger.debug('Postgres notice', { notice: notice.message }),
  })

  return {
    async query(text: string): Promise<Row[]> {
      const rows = await sql.unsafe(text)
      return [...rows]
    },
    end: () => sql.end(),
  }
}

/**
 * Initialize TimescaleDB
 */
export async function setupTimescale(config: PostgresConfig, options: TimescaleOptions): Promise<StoreResult> {
  const { logger, connect = connectPostgres } = options
  let sql: SqlExecutor | undefined

  try {
    sql = connect(config, logger)
    await ensureExtension(sql, logger)

    const executor = sql
    for (const table of TABLES) {
      await tolerateConflict(() => executor.query(table.ddl), classifyPostgresError, logger, `table ${table.name}`)
    }

    for (const table of TABLES) {
      if (!table.hypertable) continue
      await tolerateConflict(
        () => executor.query(`SELECT create_hypertable('${table.name}', '${table.hypertable}', if_not_exists => TRUE)`),
        classifyHypertableError,
        logger,
        `hypertable ${table.name}`
      )
    }

    for (const table of TABLES) {
      for (const index of table.indexes) {
        await tolerateConflict(
          () => executor.query(`CREATE INDEX IF NOT EXISTS ${index.name} ON ${table.name} (${index.column})`),
          classifyPostgresError,
          logger,
          `index ${index.name}`
        )
      }
    }

    logger.info('TimescaleDB tables and hypertables created', { tables: TABLES.map(t => t.name) })
    return { store: 'timescaledb', success: true }
  } catch (error) {
    return storeFailure('timescaledb', error, classifyPostgresError, logger)
  } finally {
    await sql?.end().catch((error: unknown) => {
      logger.debug('Error closing Postgres connection', { error: errorMessage(error) })
    })
  }
}

async function ensureExtension(sql: SqlExecutor, logger: LoggerInstance): Promise<void> {
  const installed = await sql.query(`SELECT extname FROM pg_extension WHERE extname = 'timescaledb'`)
  if (installed.length > 0) {
    logger.debug('TimescaleDB extension already installed')
    return
  }

  const created = await tolerateConflict(
    () => sql.query('CREATE EXTENSION IF NOT EXISTS timescaledb CASCADE'),
    classifyPostgresError,
    logger,
    'extension timescaledb'
  )
  if (created) {
    logger.info('TimescaleDB extension created')
  }
}
