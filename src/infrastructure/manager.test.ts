/**
 * Setup Manager Tests
 */

import { mkdtemp, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import type { Document } from 'mongodb'
import { loadConfig, type SetupConfig } from '../config'
import { createMemoryLogger, messages } from '../testing'
import type { StoreResult } from '../types'
import type { CommandRunner } from './containers'
import { createSetupManager, exitCodeFor, type SetupDependencies, type SetupReporter } from './manager'
import type { MongoConnection } from './mongo'
import type { KeyValueClient } from './redis'
import type { SqlExecutor } from './timescale'

const noDocker: CommandRunner = async () => ({ exitCode: 127, stdout: '', stderr: 'spawn docker ENOENT' })

const postgresStub = (): SqlExecutor => ({
  query: async () => [],
  end: async () => {},
})

const mongoStub = async (): Promise<MongoConnection> => ({
  db: {
    createCollection: async () => {},
    command: async (): Promise<Document> => ({ ok: 1 }),
    collection: () => ({
      createIndex: async () => 'index',
      countDocuments: async () => 0,
      insertMany: async (documents) => documents.length,
    }),
  },
  close: async () => {},
})

const redisStub = async (): Promise<KeyValueClient> => ({
  ping: async () => 'PONG',
  hset: async () => 1,
  publish: async () => 0,
  quit: async () => {},
})

const refused = (port: number) => async (): Promise<never> => {
  throw Object.assign(new Error(`connect ECONNREFUSED 127.0.0.1:${port}`), { code: 'ECONNREFUSED' })
}

function recordingReporter() {
  const events: string[] = []
  const reporter: SetupReporter = {
    containersStarting: () => events.push('containers:start'),
    containersWaiting: (ms) => events.push(`containers:wait:${ms}`),
    containersFinished: (report) => events.push(`containers:done:${report.runtime ?? 'none'}`),
    storeStarting: (store) => events.push(`${store}:start`),
    storeFinished: (result) => events.push(`${result.store}:${result.success ? 'ok' : 'failed'}`),
    finished: (report) => events.push(`finished:${report.exitCode}`),
  }
  return { reporter, events }
}

describe('SetupManager', () => {
  let root: string
  let config: SetupConfig

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'db-setup-'))
    config = loadConfig({ SETUP_ROOT: root }, '/')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  function deps(overrides: Partial<SetupDependencies> = {}) {
    const { logger, entries } = createMemoryLogger()
    const dependencies: SetupDependencies = {
      logger,
      run: noDocker,
      sleep: async () => {},
      connectPostgres: postgresStub,
      connectMongo: mongoStub,
      connectRedis: redisStub,
      now: () => 1_700_000_000_000,
      ...overrides,
    }
    return { dependencies, entries }
  }

  test('runs every stage in order and exits 0', async () => {
    const { dependencies } = deps()
    const { reporter, events } = recordingReporter()

    const report = await createSetupManager(config, dependencies).run(reporter)

    expect(report.exitCode).toBe(0)
    expect(report.results.map(r => r.store)).toEqual(['timescaledb', 'mongodb', 'redis'])
    expect(events).toEqual([
      'containers:start',
      'containers:done:none',
      'timescaledb:start',
      'timescaledb:ok',
      'mongodb:start',
      'mongodb:ok',
      'redis:start',
      'redis:ok',
      'finished:0',
    ])
  })

  test('reports the readiness pause after launching containers', async () => {
    const freshDocker: CommandRunner = async (_command, args) => ({
      exitCode: 0,
      stdout: args[0] === '--version' ? 'Docker version 27.0.3' : '',
      stderr: '',
    })
    const { dependencies } = deps({ run: freshDocker })
    const { reporter, events } = recordingReporter()

    await createSetupManager(config, dependencies).run(reporter)

    expect(events.slice(0, 3)).toEqual(['containers:start', 'containers:wait:5000', 'containers:done:docker'])
  })

  test('creates the data directories', async () => {
    const { dependencies } = deps()

    await createSetupManager(config, dependencies).run(recordingReporter().reporter)

    for (const dir of ['data', 'data/db', 'data/samples']) {
      expect((await stat(join(root, dir))).isDirectory()).toBe(true)
    }
  })

  test('keeps going after a store fails', async () => {
    const { dependencies, entries } = deps({ connectMongo: refused(27017) })
    const { reporter, events } = recordingReporter()

    const report = await createSetupManager(config, dependencies).run(reporter)

    expect(report.exitCode).toBe(1)
    expect(report.results.map(r => r.success)).toEqual([true, false, true])
    expect(events.slice(-2)).toEqual(['redis:ok', 'finished:1'])
    expect(messages(entries, 'error')).toEqual(['Error connecting to MongoDB: connect ECONNREFUSED 127.0.0.1:27017'])
  })

  test('tags store logs with the store name', async () => {
    const { dependencies, entries } = deps({ connectRedis: refused(6379) })

    await createSetupManager(config, dependencies).initialize('redis')

    const failure = entries.find(entry => entry.level === 'error')
    expect(failure?.store).toBe('redis')
  })

  test('fails every store when nothing is reachable', async () => {
    const { dependencies } = deps({
      connectPostgres: () => ({ query: refused(5432), end: async () => {} }),
      connectMongo: refused(27017),
      connectRedis: refused(6379),
    })

    const report = await createSetupManager(config, dependencies).run(recordingReporter().reporter)

    expect(report.exitCode).toBe(1)
    expect(report.results.every(r => r.error?.kind === 'connection')).toBe(true)
  })

  test('warns when the data directories cannot be created', async () => {
    const blocked = loadConfig({ SETUP_ROOT: '/dev/null/nested' }, '/')
    const { dependencies, entries } = deps()

    const { reporter, events } = recordingReporter()

    await createSetupManager(blocked, dependencies).run(reporter)

    expect(events.at(-1)).toMatch(/^finished:/)
    expect(messages(entries, 'warn')).toContain('Could not create data directories')
  })
})

describe('exitCodeFor', () => {
  const ok = (store: StoreResult['store']): StoreResult => ({ store, success: true })

  test('is 0 only when every store succeeded', () => {
    expect(exitCodeFor([ok('timescaledb'), ok('mongodb'), ok('redis')])).toBe(0)
    expect(exitCodeFor([ok('timescaledb'), { store: 'redis', success: false }])).toBe(1)
  })

  test('is 1 when nothing ran', () => {
    expect(exitCodeFor([])).toBe(1)
  })
})
