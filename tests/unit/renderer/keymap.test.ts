import { describe, it, expect, vi } from 'vitest'
import { dispatchCommand, mapKeypress } from '../../../src/renderer/input/keymap'
import { createVaultStore } from '../../../src/renderer/store/vault.store'
import type { VaultApi } from '../../../src/renderer/api/vault-api'

describe('mapKeypress', () => {
  it('should quit on Ctrl+C in every mode', () => {
    expect(mapKeypress('normal', '\u0003', { name: 'c', ctrl: true })).toEqual({ type: 'quit' })
    expect(mapKeypress('editing_password', '\u0003', { name: 'c', ctrl: true })).toEqual({ type: 'quit' })
  })

  describe('normal mode', () => {
    it.each([
      ['up', undefined, { type: 'previous' }],
      ['down', undefined, { type: 'next' }],
      ['q', 'q', { type: 'quit' }],
      ['a', 'a', { type: 'add' }],
      ['v', 'v', { type: 'reveal' }]
    ])('should map %s', (name, str, expected) => {
      expect(mapKeypress('normal', str, { name })).toEqual(expected)
    })

    it('should ignore other keys', () => {
      expect(mapKeypress('normal', 'x', { name: 'x' })).toBeNull()
      expect(mapKeypress('normal', '\r', { name: 'return' })).toBeNull()
      expect(mapKeypress('normal', '\u0001', { name: 'a', ctrl: true })).toBeNull()
    })
  })

  describe('editing modes', () => {
    it('should map the editing keys', () => {
      expect(mapKeypress('editing_account', '\u001b', { name: 'escape' })).toEqual({ type: 'cancel' })
      expect(mapKeypress('editing_account', '\r', { name: 'return' })).toEqual({ type: 'confirm' })
      expect(mapKeypress('editing_account', '\n', { name: 'enter' })).toEqual({ type: 'confirm' })
      expect(mapKeypress('editing_account', '\u007f', { name: 'backspace' })).toEqual({ type: 'backspace' })
    })

    it('should type printable characters, including the command letters', () => {
      expect(mapKeypress('editing_account', 'q', { name: 'q' })).toEqual({ type: 'char', char: 'q' })
      expect(mapKeypress('editing_password', 'Ü', {})).toEqual({ type: 'char', char: 'Ü' })
    })

    it('should drop control characters and arrows', () => {
      expect(mapKeypress('editing_account', '\t', { name: 'tab' })).toBeNull()
      expect(mapKeypress('editing_account', undefined, { name: 'up' })).toBeNull()
      expect(mapKeypress('editing_account', 'x', { name: 'x', meta: true })).toBeNull()
    })
  })
})

describe('dispatchCommand', () => {
  it('should drive the store through an add flow', () => {
    const api: VaultApi = {
      listEntries: vi.fn(() => []),
      addEntry: vi.fn(() => ({ success: true as const, data: undefined })),
      revealPassword: vi.fn(() => ({ success: true as const, data: '' }))
    }
    const store = createVaultStore(api)

    dispatchCommand(store, { type: 'add' })
    dispatchCommand(store, { type: 'char', char: 'a' })
    dispatchCommand(store, { type: 'char', char: 'b' })
    dispatchCommand(store, { type: 'backspace' })
    dispatchCommand(store, { type: 'confirm' })
    dispatchCommand(store, { type: 'char', char: 'p' })
    dispatchCommand(store, { type: 'confirm' })

    expect(api.addEntry).toHaveBeenCalledWith('a', 'p')
    expect(store.getState().inputMode).toBe('normal')

    dispatchCommand(store, { type: 'quit' })
    expect(store.getState().quitRequested).toBe(true)
  })
})
