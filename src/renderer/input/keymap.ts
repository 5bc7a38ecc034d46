import type { Key } from 'readline'
import type { InputMode, VaultStore } from '../store/vault.store'

export type KeyCommand =
  | { type: 'quit' }
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'add' }
  | { type: 'reveal' }
  | { type: 'cancel' }
  | { type: 'confirm' }
  | { type: 'backspace' }
  | { type: 'char'; char: string }

function isPrintable(str: string | undefined): str is string {
  return str !== undefined && str.length > 0 && !/[\u0000-\u001f\u007f]/.test(str)
}

/**
 * Maps a readline keypress to a UI command for the given input mode.
 *
 * @returns `null` for keys that do nothing in that mode.
 */
export function mapKeypress(mode: InputMode, str: string | undefined, key: Key): KeyCommand | null {
  if (key.ctrl && key.name === 'c') return { type: 'quit' }

  if (mode === 'normal') {
    switch (key.name) {
      case 'up':
        return { type: 'previous' }
      case 'down':
        return { type: 'next' }
    }
    if (key.ctrl || key.meta) return null
    switch (str) {
      case 'q':
        return { type: 'quit' }
      case 'a':
        return { type: 'add' }
      case 'v':
        return { type: 'reveal' }
      default:
        return null
    }
  }

  switch (key.name) {
    case 'escape':
      return { type: 'cancel' }
    case 'return':
    case 'enter':
      return { type: 'confirm' }
    case 'backspace':
      return { type: 'backspace' }
  }
  if (key.ctrl || key.meta) return null
  return isPrintable(str) ? { type: 'char', char: str } : null
}

/**
 * Applies a command to the UI store.
 */
export function dispatchCommand(store: VaultStore, command: KeyCommand): void {
  const state = store.getState()
  switch (command.type) {
    case 'quit':
      state.requestQuit()
      break
    case 'next':
      state.selectNext()
      break
    case 'previous':
      state.selectPrevious()
      break
    case 'add':
      state.startAdding()
      break
    case 'reveal':
      state.revealSelected()
      break
    case 'cancel':
      state.cancelInput()
      break
    case 'confirm':
      state.confirmInput()
      break
    case 'backspace':
      state.deleteChar()
      break
    case 'char':
      state.typeChar(command.char)
      break
  }
}
