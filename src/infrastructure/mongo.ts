/**
 * MongoDB Initializer
 *
 * Creates the validated collections and their indexes, then seeds
 * collections that are still empty.
 */

import { Double, MongoClient, MongoNetworkError, MongoServerSelectionError, type Db, type Document } from 'mongodb'
import { mongoUrl, type MongoConfig } from '../config'
import { NETWORK_ERROR_CODES, errorCode, errorMessage, storeFailure, tolerateConflict, type SetupErrorKind } from '../errors'
import type { LoggerInstance } from '../log'
import type { StoreResult } from '../types'
import {
  COLLECTIONS,
  DEFAULT_ADMIN,
  GROUND_STATIONS,
  SATELLITES,
  USERS,
  type CollectionDefinition,
} from './mongo-schemas'
import { loadGroundStationSamples, loadSatelliteSamples, type GroundStationSample } from './samples'

export interface DocumentCollection {
  createIndex(keys: Record<string, 1 | -1>, options: { unique: boolean }): Promise<string>
  countDocuments(): Promise<number>
  insertMany(documents: Document[]): Promise<number>
}

/**
 * The slice of a MongoDB database handle the initializer uses
 */
export interface DocumentDatabase {
  createCollection(name: string, options: { validator: Document }): Promise<void>
  command(command: Document): Promise<Document>
  collection(name: string): DocumentCollection
}

export interface MongoConnection {
  db: DocumentDatabase
  close(): Promise<void>
}

export interface MongoOptions {
  logger: LoggerInstance
  samplesDir: string
  connect?: (config: MongoConfig) => Promise<MongoConnection>
  now?: () => Date
}

const NAMESPACE_EXISTS = 48
const AUTHENTICATION_FAILED = 18

export function classifyMongoError(error: unknown): SetupErrorKind {
  if (error instanceof MongoNetworkError || error instanceof MongoServerSelectionError) return 'connection'

  const code = errorCode(error)
  if (code === NAMESPACE_EXISTS) return 'conflict'
  if (code === AUTHENTICATION_FAILED) return 'connection'
  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) return 'connection'
  if (code !== undefined) return 'unexpected'

  if (/already exists/i.test(errorMessage(error))) return 'conflict'
  return 'unexpected'
}

function wrapDb(db: Db): DocumentDatabase {
  return {
    async createCollection(name, options) {
      await db.createCollection(name, options)
    },
    command: (command) => db.command(command),
    collection(name) {
      const collection = db.collection(name)
      return {
        createIndex: (keys, options) => collection.createIndex(keys, options),
        countDocuments: () => collection.countDocuments({}),
        async insertMany(documents) {
          const result = await collection.insertMany(documents)
          return result.insertedCount
        },
      }
    },
  }
}

export async function connectMongo(config: MongoConfig): Promise<MongoConnection> {
  const client = new MongoClient(mongoUrl(config))
  try {
    await client.connect()
  } catch (error) {
    await client.close()
    throw error
  }
  return {
    db: wrapDb(client.db(config.database)),
    close: () => client.close(),
  }
}

/**
 * Initialize MongoDB
 */
export async function setupMongo(config: MongoConfig, options: MongoOptions): Promise<StoreResult> {
  const { logger, samplesDir, connect = connectMongo, now = () => new Date() } = options
  let connection: MongoConnection | undefined

  try {
    connection = await connect(config)
    const { db } = connection

    for (const definition of COLLECTIONS) {
      await ensureCollection(db, definition, logger)
    }

    for (const definition of COLLECTIONS) {
      for (const index of definition.indexes) {
        const name = await db.collection(definition.name).createIndex(index.keys, { unique: index.unique ?? false })
        logger.debug('Index ensured', { collection: definition.name, index: name })
      }
    }

    logger.info('MongoDB collections and indexes created', { collections: COLLECTIONS.map(c => c.name) })

    await seedIfEmpty(db, SATELLITES, logger, async () => loadSatelliteSamples(samplesDir))
    await seedIfEmpty(db, GROUND_STATIONS, logger, async () => {
      const stations = await loadGroundStationSamples(samplesDir)
      return stations && stations.map(toStationDocument)
    })
    await seedIfEmpty(db, USERS, logger, async () => [{ ...DEFAULT_ADMIN, created_at: now() }])

    return { store: 'mongodb', success: true }
  } catch (error) {
    return storeFailure('mongodb', error, classifyMongoError, logger)
  } finally {
    await connection?.close().catch((error: unknown) => {
      logger.debug('Error closing MongoDB connection', { error: errorMessage(error) })
    })
  }
}

/**
 * Create the collection, or bring the validator of an existing one up to date
 */
async function ensureCollection(db: DocumentDatabase, definition: CollectionDefinition, logger: LoggerInstance): Promise<void> {
  const { name, validator } = definition
  const created = await tolerateConflict(
    () => db.createCollection(name, { validator }),
    classifyMongoError,
    logger,
    `collection ${name}`
  )

  if (created) {
    logger.debug('Collection created', { collection: name })
  } else {
    await db.command({ collMod: name, validator })
    logger.debug('Collection validator updated', { collection: name })
  }
}

/**
 * Insert the loaded documents only when the collection has none
 *
 * @returns number of documents inserted
 */
async function seedIfEmpty(
  db: DocumentDatabase,
  name: string,
  logger: LoggerInstance,
  load: () => Promise<Document[] | null>
): Promise<number> {
  const collection = db.collection(name)
  const count = await collection.countDocuments()
  if (count > 0) {
    logger.debug('Collection already populated, skipping seed', { collection: name, count })
    return 0
  }

  const documents = await load()
  if (!documents || documents.length === 0) {
    logger.debug('No seed data available', { collection: name })
    return 0
  }

  const inserted = await collection.insertMany(documents)
  logger.info('Seed data loaded', { collection: name, count: inserted })
  return inserted
}

/**
 * The validator requires BSON doubles; whole numbers would otherwise be
 * written as int32.
 */
export function toStationDocument(station: GroundStationSample): Document {
  const { latitude, longitude, altitude, ...location } = station.location
  return {
    ...station,
    location: {
      ...location,
      latitude: new Double(latitude),
      longitude: new Double(longitude),
      ...(altitude !== undefined ? { altitude: new Double(altitude) } : {}),
    },
  }
}
