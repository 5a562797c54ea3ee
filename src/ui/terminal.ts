/**
 * Terminal Utilities
 *
 * Colors, symbols, and TTY detection for setup output
 */

/**
 * Check if terminal supports colors
 */
export function supportsColor(): boolean {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.TERM === 'dumb') return false
  if (process.env.CI && process.env.GITHUB_ACTIONS) return true
  if (!process.stdout.isTTY) return false
  return true
}

const colorEnabled = supportsColor()

/**
 * ANSI color codes (empty when colors are disabled)
 */
export const c = {
  reset: colorEnabled ? '\x1b[0m' : '',

  bold: colorEnabled ? '\x1b[1m' : '',
  dim: colorEnabled ? '\x1b[2m' : '',

  red: colorEnabled ? '\x1b[31m' : '',
  green: colorEnabled ? '\x1b[32m' : '',
  yellow: colorEnabled ? '\x1b[33m' : '',
  blue: colorEnabled ? '\x1b[34m' : '',
  magenta: colorEnabled ? '\x1b[35m' : '',
  cyan: colorEnabled ? '\x1b[36m' : '',
}

/**
 * Unicode symbols for visual indicators
 */
export const s = {
  check: '\u2713',      // ✓
  cross: '\u2717',      // ✗
  warning: '\u26A0',    // ⚠
  info: '\u2139',       // ℹ
  dot: '\u00B7',        // ·

  // Box drawing
  topLeft: '\u250C',     // ┌
  topRight: '\u2510',    // ┐
  bottomLeft: '\u2514',  // └
  bottomRight: '\u2518', // ┘
  horizontal: '\u2500',  // ─
  vertical: '\u2502',    // │

  // Spinner frames (braille)
  spinner: ['\u280B', '\u2819', '\u2839', '\u2838', '\u283C', '\u2834', '\u2826', '\u2827', '\u2807', '\u280F'],
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str
  const padding = ' '.repeat(width - str.length)
  return align === 'left' ? str + padding : padding + str
}

/**
 * Strip ANSI escape codes (for length calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '')
}

/**
 * Clear current line and move cursor to beginning
 */
export function clearLine(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\r\x1b[K')
  }
}

export function hideCursor(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\x1b[?25l')
  }
}

export function showCursor(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\x1b[?25h')
  }
}
