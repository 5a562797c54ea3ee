/**
 * Test helpers
 */

import { Log, type LogEntry, type LoggerInstance } from './log'

/**
 * Logger that records every entry, debug included
 */
export function createMemoryLogger(): { logger: LoggerInstance; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = Log.create('test')
    .level('debug')
    .transport({ write: (entry) => { entries.push(entry) } })
    .build()
  return { logger, entries }
}

export function messages(entries: LogEntry[], level?: LogEntry['level']): string[] {
  return entries.filter(entry => !level || entry.level === level).map(entry => entry.message)
}
