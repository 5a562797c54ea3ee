/**
 * Output Formatting Tests
 */

import { afterEach, describe, test, expect, vi } from 'vitest'
import { SetupError } from '../errors'
import { box, panel } from './box'
import { createConsoleReporter, formatContainerOutcome, formatSummary } from './output'
import { stripAnsi } from './terminal'

describe('box', () => {
  test('fits the widest line and the title', () => {
    const lines = stripAnsi(box(['ab'], { title: 'T' })).split('\n')

    expect(lines).toEqual([
      '┌ T ─┐',
      '│ ab │',
      '└────┘',
    ])
  })

  test('pads shorter lines to a fixed width', () => {
    const lines = stripAnsi(box(['a', 'abc'], { width: 9 })).split('\n')

    expect(lines[1]).toBe('│ a     │')
    expect(lines[2]).toBe('│ abc   │')
  })

  test('panel holds only its title', () => {
    const lines = stripAnsi(panel('Setting up Redis')).split('\n')

    expect(lines).toHaveLength(3)
    expect(lines[1]).toBe('│ Setting up Redis │')
  })
})

describe('formatContainerOutcome', () => {
  test('names a running container', () => {
    const line = formatContainerOutcome({ store: 'mongodb', name: 'llamaspace-mongodb', state: 'running' })

    expect(stripAnsi(line)).toBe('✓ MongoDB is already running · llamaspace-mongodb')
  })

  test('shows why a container failed', () => {
    const line = formatContainerOutcome({ store: 'redis', name: 'llamaspace-redis', state: 'failed', error: 'port is already allocated' })

    expect(stripAnsi(line)).toBe('✗ Redis failed to start (port is already allocated)')
  })
})

describe('formatSummary', () => {
  test('aligns one status per store', () => {
    const lines = formatSummary([
      { store: 'timescaledb', success: true },
      { store: 'mongodb', success: false },
      { store: 'redis', success: true },
    ]).map(stripAnsi)

    expect(lines).toEqual([
      'TimescaleDB: SUCCESS',
      'MongoDB:     FAILED',
      'Redis:       SUCCESS',
    ])
  })
})

describe('createConsoleReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  function captureConsole() {
    const lines: string[] = []
    vi.spyOn(console, 'log').mockImplementation((line: unknown = '') => {
      lines.push(stripAnsi(String(line)))
    })
    return lines
  }

  test('warns once when docker is missing', () => {
    const lines = captureConsole()

    createConsoleReporter().containersFinished({ runtime: null, networkCreated: false, containers: [], waitedMs: 0 })

    expect(lines).toEqual([
      '⚠ Docker not found. Assuming databases are already running.',
      '⚠ If databases are not running, please start them manually.',
      '',
    ])
  })

  test('settles the readiness wait before listing containers', () => {
    const lines = captureConsole()
    const reporter = createConsoleReporter()

    reporter.containersWaiting(5000)
    reporter.containersFinished({
      runtime: 'docker',
      networkCreated: true,
      containers: [{ store: 'redis', name: 'llamaspace-redis', state: 'created' }],
      waitedMs: 5000,
    })

    expect(lines).toEqual([
      '  Waiting for databases to be ready...',
      '✓ Databases ready',
      '  ✓ Redis created · llamaspace-redis',
      '',
    ])
  })

  test('names only the failed store', () => {
    const lines = captureConsole()
    const error = SetupError.from('mongodb', new Error('connect ECONNREFUSED 127.0.0.1:27017'), () => 'connection')

    createConsoleReporter().storeFinished({ store: 'mongodb', success: false, error })

    expect(lines).toEqual(['✗ MongoDB setup failed', ''])
  })
})
