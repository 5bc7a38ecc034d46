/**
 * Interactive terminal front end: alternate screen, raw keyboard input,
 * full redraw on every UI state change.
 */

import { emitKeypressEvents, type Key } from 'readline'
import { LogRing } from '../main/services/diagnostics/log-ring'
import { dispatchCommand, mapKeypress } from './input/keymap'
import type { VaultStore } from './store/vault.store'
import { renderVaultView } from './views/vault-view'

const ENTER_ALT_SCREEN = '\u001b[?1049h'
const LEAVE_ALT_SCREEN = '\u001b[?1049l'
const HIDE_CURSOR = '\u001b[?25l'
const SHOW_CURSOR = '\u001b[?25h'
const CLEAR_SCREEN = '\u001b[H\u001b[2J'

/** Lines taken by every panel except the list rows. */
const FIXED_LINES = 16
const MIN_LIST_ROWS = 4

/** The parts of `process.stdin` the UI relies on. */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean
  setRawMode(mode: boolean): unknown
}

/** The parts of `process.stdout` the UI relies on. */
export interface TerminalOutput extends NodeJS.WritableStream {
  columns?: number
  rows?: number
  hasColors?(): boolean
}

export interface TerminalStreams {
  input: TerminalInput
  output: TerminalOutput
}

interface PendingRun {
  resolve: () => void
  reject: (reason: unknown) => void
}

export class TerminalApp {
  private readonly logger = LogRing.getInstance()
  private unsubscribe: (() => void) | null = null
  private pending: PendingRun | null = null

  constructor(
    private readonly store: VaultStore,
    private readonly streams: TerminalStreams = { input: process.stdin, output: process.stdout }
  ) {}

  /**
   * Takes over the terminal until the operator quits.
   *
   * The returned promise rejects, after the terminal has been restored, when
   * handling a key or a resize throws.
   *
   * @throws If stdin is not an interactive terminal.
   */
  run(): Promise<void> {
    const { input, output } = this.streams
    if (!input.isTTY) {
      throw new Error('Passvault needs an interactive terminal (stdin is not a TTY).')
    }

    return new Promise<void>((resolve, reject) => {
      this.pending = { resolve, reject }

      emitKeypressEvents(input)
      input.setRawMode(true)
      input.on('keypress', this.onKeypress)
      input.resume()
      output.on('resize', this.onResize)
      output.write(ENTER_ALT_SCREEN + HIDE_CURSOR)

      this.unsubscribe = this.store.subscribe((state) => {
        if (state.quitRequested) {
          this.stop()
        } else {
          this.draw()
        }
      })

      this.logger.info('Terminal UI started')
      this.guard(this.draw)
    })
  }

  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    this.guard(() => {
      const command = mapKeypress(this.store.getState().inputMode, str, key ?? {})
      if (command) {
        dispatchCommand(this.store, command)
      }
    })
  }

  private readonly onResize = (): void => {
    this.guard(this.draw)
  }

  private guard(action: () => void): void {
    try {
      action()
    } catch (err) {
      this.logger.error('Terminal UI handler failed', err)
      this.stop({ error: err })
    }
  }

  private readonly draw = (): void => {
    const { output } = this.streams
    const lines = renderVaultView(this.store.getState(), {
      width: output.columns ?? 80,
      listRows: Math.max((output.rows ?? 24) - FIXED_LINES, MIN_LIST_ROWS),
      color: output.hasColors?.() ?? false
    })
    output.write(CLEAR_SCREEN + lines.join('\r\n'))
  }

  private stop(failure: { error: unknown } | null = null): void {
    const pending = this.pending
    if (!pending) return
    this.pending = null

    const { input, output } = this.streams
    this.unsubscribe?.()
    this.unsubscribe = null
    input.off('keypress', this.onKeypress)
    output.off('resize', this.onResize)
    input.setRawMode(false)
    input.pause()
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN)

    this.logger.info('Terminal UI stopped')
    if (failure) {
      pending.reject(failure.error)
    } else {
      pending.resolve()
    }
  }
}
