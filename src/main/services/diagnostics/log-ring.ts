import { join } from 'path'
import { writeFileSync, mkdirSync } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  data?: unknown
}

export const MAX_ENTRIES = 1000

/**
 * Process-wide logger that buffers the last {@link MAX_ENTRIES} entries in
 * memory.
 *
 * Nothing is printed: the terminal UI owns stdout. The buffer reaches disk
 * only through {@link LogRing.flush}.
 *
 * @example
 * ```ts
 * const logger = LogRing.getInstance()
 * logger.info('Entries loaded', { count: 3, migrated: false })
 * logger.flush(config.logDir)
 * ```
 */
export class LogRing {
  private static instance: LogRing | null = null

  private readonly slots: LogEntry[] = []
  /** Slot the next entry goes into once the buffer is full. */
  private next = 0

  private constructor() {}

  static getInstance(): LogRing {
    LogRing.instance ??= new LogRing()
    return LogRing.instance
  }

  debug(message: string, data?: unknown): void {
    this.append('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.append('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.append('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.append('error', message, data)
  }

  /** Oldest first; `count` keeps only the newest entries. */
  getEntries(count?: number): LogEntry[] {
    const ordered = [...this.slots.slice(this.next), ...this.slots.slice(0, this.next)]
    return count === undefined ? ordered : ordered.slice(Math.max(ordered.length - count, 0))
  }

  clear(): void {
    this.slots.length = 0
    this.next = 0
  }

  /**
   * Writes the buffer to `<logsDir>/log-ring-<timestamp>.json`, creating the
   * directory when needed.
   *
   * @returns The path written.
   */
  flush(logsDir: string): string {
    mkdirSync(logsDir, { recursive: true })

    const stamp = new Date().toISOString().replace(/[:.]/g, '-')
    const filePath = join(logsDir, `log-ring-${stamp}.json`)
    try {
      writeFileSync(filePath, JSON.stringify(this.getEntries(), null, 2), { encoding: 'utf-8' })
    } catch (err) {
      throw new Error(`Could not write logs to "${filePath}": ${err instanceof Error ? err.message : String(err)}`)
    }
    return filePath
  }

  private append(level: LogLevel, message: string, data: unknown): void {
    const entry: LogEntry = { level, message, timestamp: new Date().toISOString() }
    if (data !== undefined) {
      entry.data = data instanceof Error ? { name: data.name, message: data.message, stack: data.stack } : data
    }

    if (this.slots.length < MAX_ENTRIES) {
      this.slots.push(entry)
      return
    }
    this.slots[this.next] = entry
    this.next = (this.next + 1) % MAX_ENTRIES
  }
}
