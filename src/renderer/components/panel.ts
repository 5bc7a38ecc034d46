import { fit, paint, visibleLength, type StyledText } from './style'

export interface PanelOptions {
  title: string
  width: number
  /** Inner rows; content is padded with blank rows or cut to this height. */
  height?: number
  color: boolean
}

/**
 * Draws a bordered block with its title set into the top border.
 *
 * @example
 * ```ts
 * panel([{ text: 'hello' }], { title: 'Box', width: 11, color: false })
 * // ['┌Box──────┐', '│hello    │', '└─────────┘']
 * ```
 */
export function panel(content: readonly StyledText[], options: PanelOptions): string[] {
  const inner = Math.max(options.width - 2, 0)
  const title = fit(options.title, Math.min(visibleLength(options.title), inner))
  const top = `┌${title}${'─'.repeat(inner - visibleLength(title))}┐`
  const bottom = `└${'─'.repeat(inner)}┘`

  const rows = options.height === undefined ? content : content.slice(0, options.height)
  const body = rows.map((line) => `│${paint(fit(line.text, inner, line.align), line.style, options.color)}│`)

  const padding = options.height === undefined ? 0 : options.height - rows.length
  for (let i = 0; i < padding; i++) {
    body.push(`│${' '.repeat(inner)}│`)
  }

  return [top, ...body, bottom]
}

/**
 * Joins two column blocks line by line. The shorter block is padded with
 * blank space of its own width.
 */
export function sideBySide(left: readonly string[], leftWidth: number, right: readonly string[]): string[] {
  const rows = Math.max(left.length, right.length)
  const result: string[] = []
  for (let i = 0; i < rows; i++) {
    result.push((left[i] ?? ' '.repeat(leftWidth)) + (right[i] ?? ''))
  }
  return result
}
