/**
 * Setup Errors
 *
 * Every failure is sorted into one of four kinds:
 * - connection: the store could not be reached or refused our credentials
 * - conflict: the object already exists; tolerated silently
 * - unexpected: anything else raised while applying setup
 * - config: invalid environment, reported before any stage runs
 */

import type { LoggerInstance } from './log'
import { STORE_LABELS, type StoreName, type StoreResult } from './types'

export type SetupErrorKind = 'connection' | 'conflict' | 'unexpected' | 'config'

/**
 * Maps a driver error to a kind. Classifiers look at structured codes
 * first and only fall back to the message when the driver gives none.
 */
export type ErrorClassifier = (error: unknown) => SetupErrorKind

export class SetupError extends Error {
  readonly kind: SetupErrorKind
  readonly store?: StoreName
  readonly code?: string | number

  constructor(kind: SetupErrorKind, message: string, options: { store?: StoreName; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'SetupError'
    this.kind = kind
    this.store = options.store
    this.code = errorCode(options.cause)
  }

  static config(message: string): SetupError {
    return new SetupError('config', message)
  }

  /**
   * Wrap a driver error raised while setting up a store
   */
  static from(store: StoreName, error: unknown, classify: ErrorClassifier): SetupError {
    if (error instanceof SetupError) return error

    const kind = classify(error)
    const label = STORE_LABELS[store]
    const prefix = kind === 'connection' ? `Error connecting to ${label}` : `Error setting up ${label}`
    return new SetupError(kind, `${prefix}: ${errorMessage(error)}`, { store, cause: error })
  }
}

/**
 * Structured error code (SQLSTATE, errno name, server code), if any
 */
export function errorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error
    if (typeof code === 'string' || typeof code === 'number') return code
  }
  if (error instanceof AggregateError) {
    return errorCode(error.errors[0])
  }
  return undefined
}

export function errorMessage(error: unknown): string {
  if (error instanceof AggregateError && !error.message && error.errors.length > 0) {
    return errorMessage(error.errors[0])
  }
  if (error instanceof Error) return error.message
  return String(error)
}

/** Socket-level failures shared by every driver */
export const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
])

/**
 * Run a setup step, tolerating "already exists" failures
 *
 * @returns true when the step applied, false when it was a no-op conflict
 */
export async function tolerateConflict(
  step: () => Promise<unknown>,
  classify: ErrorClassifier,
  logger: LoggerInstance,
  description: string
): Promise<boolean> {
  try {
    await step()
    return true
  } catch (error) {
    if (classify(error) !== 'conflict') throw error
    logger.debug(`${description}: already exists`, { code: errorCode(error) })
    return false
  }
}

/**
 * Turn an error caught by a store initializer into its failed result
 */
export function storeFailure(
  store: StoreName,
  error: unknown,
  classify: ErrorClassifier,
  logger: LoggerInstance
): StoreResult {
  const setupError = SetupError.from(store, error, classify)
  logger.error(setupError.message, { kind: setupError.kind, code: setupError.code })
  if (setupError.kind === 'connection') {
    logger.warn(`Make sure ${STORE_LABELS[store]} is running and accessible`)
  }
  return { store, success: false, error: setupError }
}
