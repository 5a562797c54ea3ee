/**
 * UI Module
 *
 * Terminal output for the setup CLI
 */

export { supportsColor, c, s, pad, stripAnsi } from './terminal'

export { createSpinner, type Spinner } from './spinner'

export { box, panel, errorBox } from './box'

export {
  printHeader,
  printError,
  printWarning,
  formatContainerOutcome,
  formatSummary,
  createConsoleReporter,
} from './output'
