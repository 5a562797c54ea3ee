/**
 * Box Drawing Utilities
 *
 * Bordered panels for section headers and the setup summary
 */

import { c, s, stripAnsi } from './terminal'

export interface BoxOptions {
  /** Box title (appears in top border) */
  title?: string
  /** Box width; defaults to fitting the widest line */
  width?: number
  /** Title color */
  titleColor?: string
  /** Border color */
  borderColor?: string
  /** Padding inside the box */
  padding?: number
}

/**
 * Create a bordered box with content
 *
 * @example
 * console.log(box(['TimescaleDB: SUCCESS'], { title: 'Setup Summary', width: 30 }))
 * // ┌ Setup Summary ─────────────┐
 * // │ TimescaleDB: SUCCESS       │
 * // └────────────────────────────┘
 */
export function box(lines: string[], options: BoxOptions = {}): string {
  const {
    title,
    titleColor = c.bold,
    borderColor = c.dim,
    padding = 1,
  } = options

  const widest = Math.max(0, ...lines.map(line => stripAnsi(line).length))
  const titleLength = title ? stripAnsi(title).length + 2 : 0
  const width = options.width ?? Math.max(widest + padding * 2, titleLength) + 2

  const innerWidth = width - 2
  const paddingStr = ' '.repeat(padding)

  let topBorder: string
  if (title) {
    const titleWithSpaces = ` ${title} `
    const remainingWidth = Math.max(0, width - 2 - stripAnsi(titleWithSpaces).length)
    topBorder = `${borderColor}${s.topLeft}${c.reset}${titleColor}${titleWithSpaces}${c.reset}${borderColor}${s.horizontal.repeat(remainingWidth)}${s.topRight}${c.reset}`
  } else {
    topBorder = `${borderColor}${s.topLeft}${s.horizontal.repeat(width - 2)}${s.topRight}${c.reset}`
  }

  const contentLines = lines.map(line => {
    const visibleLength = stripAnsi(line).length
    const spaces = Math.max(0, innerWidth - padding - visibleLength - padding)
    return `${borderColor}${s.vertical}${c.reset}${paddingStr}${line}${' '.repeat(spaces)}${paddingStr}${borderColor}${s.vertical}${c.reset}`
  })

  const bottomBorder = `${borderColor}${s.bottomLeft}${s.horizontal.repeat(width - 2)}${s.bottomRight}${c.reset}`

  return [topBorder, ...contentLines, bottomBorder].join('\n')
}

/**
 * A box holding only its title, sized to fit
 */
export function panel(title: string, color: string = c.blue): string {
  return box([`${color}${c.bold}${title}${c.reset}`], { borderColor: color })
}

/**
 * Create an error box
 */
export function errorBox(title: string, message: string, details?: string): string {
  const lines = [message]
  if (details) {
    lines.push('')
    lines.push(`${c.dim}${details}${c.reset}`)
  }
  return box(lines, { title: `${c.red}${title}${c.reset}`, borderColor: c.red })
}
