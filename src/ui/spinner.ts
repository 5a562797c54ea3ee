/**
 * Spinner Utility
 *
 * Animated spinner for slow setup steps
 */

import { c, s, clearLine, hideCursor, showCursor } from './terminal'

export interface Spinner {
  /** Stop spinner with success message */
  succeed: (msg: string) => void
}

/**
 * Create an animated spinner
 *
 * @example
 * const spinner = createSpinner('Waiting for databases to be ready...')
 * await sleep(5000)
 * spinner.succeed('Databases ready')
 */
export function createSpinner(text: string): Spinner {
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null
  const frames = s.spinner

  // Only animate if TTY
  if (process.stdout.isTTY) {
    hideCursor()
    interval = setInterval(() => {
      clearLine()
      const frame = frames[frameIndex++ % frames.length]
      process.stdout.write(`${c.cyan}${frame}${c.reset} ${text}`)
    }, 80)
  } else {
    console.log(`  ${text}`)
  }

  const stop = () => {
    if (interval) {
      clearInterval(interval)
      interval = null
      clearLine()
      showCursor()
    }
  }

  return {
    succeed: (msg: string) => {
      stop()
      console.log(`${c.green}${s.check}${c.reset} ${msg}`)
    },
  }
}
