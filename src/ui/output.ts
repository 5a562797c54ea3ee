/**
 * Setup Output
 *
 * Console rendering of pipeline progress and the final summary
 */

import type { ContainerOutcome, SetupReport, SetupReporter } from '../infrastructure'
import { STORE_LABELS, type StoreResult } from '../types'
import { c, s, pad } from './terminal'
import { box, errorBox, panel } from './box'
import { createSpinner, type Spinner } from './spinner'

const TITLE = 'LlamaSpace Pro Database Setup'

export function printHeader(): void {
  console.log('')
  console.log(panel(TITLE, c.cyan))
  console.log('')
}

export function printError(message: string, details?: string): void {
  console.log('')
  console.log(errorBox('Error', message, details))
  console.log('')
}

export function printWarning(message: string): void {
  console.log(`${c.yellow}${s.warning}${c.reset} ${message}`)
}

const CONTAINER_STATE_TEXT: Record<ContainerOutcome['state'], string> = {
  running: 'is already running',
  started: 'started',
  created: 'created',
  failed: 'failed to start',
}

export function formatContainerOutcome(outcome: ContainerOutcome): string {
  const label = STORE_LABELS[outcome.store]
  const text = `${label} ${CONTAINER_STATE_TEXT[outcome.state]}`
  if (outcome.state === 'failed') {
    const reason = outcome.error ? ` ${c.dim}(${outcome.error})${c.reset}` : ''
    return `${c.red}${s.cross}${c.reset} ${text}${reason}`
  }
  return `${c.green}${s.check}${c.reset} ${text} ${c.dim}${s.dot} ${outcome.name}${c.reset}`
}

/**
 * One aligned SUCCESS/FAILED line per store
 */
export function formatSummary(results: StoreResult[]): string[] {
  return results.map(({ store, success }) => {
    const status = success ? `${c.green}SUCCESS${c.reset}` : `${c.red}FAILED${c.reset}`
    return `${pad(`${STORE_LABELS[store]}:`, 13)}${status}`
  })
}

/**
 * Reporter that writes progress to the console
 */
export function createConsoleReporter(): SetupReporter {
  let spinner: Spinner | null = null

  return {
    containersStarting() {
      console.log(panel('Starting Docker containers for databases'))
      console.log('  Checking containers...')
    },

    containersWaiting() {
      spinner = createSpinner('Waiting for databases to be ready...')
    },

    containersFinished(report) {
      if (!report.runtime) {
        printWarning('Docker not found. Assuming databases are already running.')
        printWarning('If databases are not running, please start them manually.')
      } else {
        spinner?.succeed('Databases ready')
        for (const outcome of report.containers) {
          console.log(`  ${formatContainerOutcome(outcome)}`)
        }
      }
      spinner = null
      console.log('')
    },

    storeStarting(store) {
      console.log(panel(`Setting up ${STORE_LABELS[store]}`))
    },

    storeFinished(result) {
      const label = STORE_LABELS[result.store]
      if (result.success) {
        console.log(`${c.green}${s.check}${c.reset} ${label} initialized`)
      } else {
        console.log(`${c.red}${s.cross}${c.reset} ${label} setup failed`)
      }
      console.log('')
    },

    finished(report: SetupReport) {
      console.log(box(formatSummary(report.results), { title: 'Setup Summary', titleColor: `${c.cyan}${c.bold}` }))
      console.log('')
      if (report.exitCode === 0) {
        console.log(`${c.green}${c.bold}All databases successfully set up!${c.reset}`)
      } else {
        console.log(`${c.yellow}Some database setups failed. Check the logs above for details.${c.reset}`)
      }
    },
  }
}
