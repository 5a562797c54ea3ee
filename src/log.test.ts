/**
 * Log Builder Tests
 */

import { describe, test, expect, vi, afterEach } from 'vitest'
import { Log, formatPretty, type LogEntry } from './log'
import { stripAnsi } from './ui/terminal'

function recording(level: 'debug' | 'info' | 'warn' = 'info') {
  const entries: LogEntry[] = []
  const logger = Log.create('db-setup')
    .level(level)
    .transport({ write: (entry) => { entries.push(entry) } })
    .build()
  return { logger, entries }
}

describe('Log', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('drops entries below the minimum level', () => {
    const { logger, entries } = recording('warn')

    logger.debug('debug line')
    logger.info('info line')
    logger.warn('warn line')
    logger.error('error line')

    expect(entries.map(e => e.message)).toEqual(['warn line', 'error line'])
  })

  test('builds entries with service, level and context', () => {
    const { logger, entries } = recording()

    logger.info('Seed data loaded', { collection: 'satellites', count: 2 })

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Seed data loaded',
      service: 'db-setup',
      collection: 'satellites',
      count: 2,
    })
    expect(typeof entries[0].timestamp).toBe('string')
  })

  test('child loggers carry their context', () => {
    const { logger, entries } = recording()

    const child = logger.child({ store: 'redis' })
    child.warn('slow', { ms: 40 })
    logger.info('plain')

    expect(entries[0]).toMatchObject({ store: 'redis', ms: 40, message: 'slow' })
    expect(entries[1].store).toBeUndefined()
  })

  test('builder context reaches every entry and its children', () => {
    const entries: LogEntry[] = []
    const logger = Log.create('db-setup')
      .context({ environment: 'staging' })
      .transport({ write: (entry) => { entries.push(entry) } })
      .build()

    logger.info('root')
    logger.child({ store: 'mongodb' }).info('child', { environment: 'override' })

    expect(entries[0].environment).toBe('staging')
    expect(entries[1]).toMatchObject({ store: 'mongodb', environment: 'override' })
  })

  test('context cannot overwrite the level or message', () => {
    const { logger, entries } = recording()

    logger.info('real', { level: 'fatal', message: 'fake' })

    expect(entries[0].level).toBe('info')
    expect(entries[0].message).toBe('real')
  })

  test('keeps logging when a transport throws', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    const entries: LogEntry[] = []
    const logger = Log.create('db-setup')
      .transport({ write: () => { throw new Error('disk full') } })
      .transport({ write: (entry) => { entries.push(entry) } })
      .build()

    logger.info('still here')

    expect(entries).toHaveLength(1)
    expect(consoleError).toHaveBeenCalledTimes(1)
  })

  test('formats pretty lines', () => {
    const line = formatPretty({
      level: 'info',
      message: 'hello',
      timestamp: '2024-01-01T10:20:30.000Z',
      service: 'db-setup',
      store: 'redis',
    })

    expect(stripAnsi(line)).toBe('INFO  [10:20:30.000] hello {"store":"redis"}')
  })
})
