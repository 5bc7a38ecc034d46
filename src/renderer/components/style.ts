export type Color = 'white' | 'cyan' | 'green' | 'red' | 'yellow' | 'blue' | 'gray'

export interface TextStyle {
  fg?: Color
  bg?: Color
  bold?: boolean
}

/** A single line of panel content with its style. */
export interface StyledText {
  text: string
  style?: TextStyle
  align?: 'left' | 'center'
}

const FG: Record<Color, number> = {
  white: 37,
  cyan: 36,
  green: 32,
  red: 31,
  yellow: 33,
  blue: 34,
  gray: 90
}

const BG: Record<Color, number> = {
  white: 47,
  cyan: 46,
  green: 42,
  red: 41,
  yellow: 43,
  blue: 44,
  gray: 100
}

/**
 * Wraps text in SGR escape sequences. Returns the text unchanged when colour
 * is disabled or the style is empty.
 */
export function paint(text: string, style: TextStyle | undefined, color: boolean): string {
  if (!color || !style) return text

  const codes: number[] = []
  if (style.bold) codes.push(1)
  if (style.fg) codes.push(FG[style.fg])
  if (style.bg) codes.push(BG[style.bg])
  if (codes.length === 0) return text

  return `\u001b[${codes.join(';')}m${text}\u001b[0m`
}

/** Visible width in code points; escape sequences are never passed in here. */
export function visibleLength(text: string): number {
  return Array.from(text).length
}

/**
 * Pads or truncates `text` to exactly `width` code points.
 */
export function fit(text: string, width: number, align: 'left' | 'center' = 'left'): string {
  const chars = Array.from(text)
  if (chars.length >= width) return chars.slice(0, width).join('')

  const gap = width - chars.length
  if (align === 'center') {
    const left = Math.floor(gap / 2)
    return ' '.repeat(left) + text + ' '.repeat(gap - left)
  }
  return text + ' '.repeat(gap)
}
