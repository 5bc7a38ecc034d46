import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Entry, VaultApi } from '../api/vault-api'

export type InputMode = 'normal' | 'editing_account' | 'editing_password'

export type FeedbackKind = 'info' | 'success' | 'error'

export interface Feedback {
  text: string
  kind: FeedbackKind
}

export interface VaultState {
  entries: readonly Entry[]
  selected: number
  inputMode: InputMode
  accountInput: string
  passwordInput: string
  feedback: Feedback | null
  quitRequested: boolean

  selectNext: () => void
  selectPrevious: () => void
  startAdding: () => void
  typeChar: (char: string) => void
  deleteChar: () => void
  cancelInput: () => void
  confirmInput: () => void
  revealSelected: () => void
  requestQuit: () => void
}

export type VaultStore = StoreApi<VaultState>

export const MESSAGES = {
  added: 'Entry added and password encrypted.',
  saveFailed: (reason: string) => `Error saving entry: ${reason}`,
  revealed: (account: string, password: string) => `Password for ${account}: ${password}`
} as const

/**
 * Creates the terminal UI state machine bound to a vault session.
 *
 * Editing flows normal → editing_account → editing_password → normal; the
 * entry is only submitted to the vault on the last confirm.
 */
export function createVaultStore(api: VaultApi): VaultStore {
  return createStore<VaultState>((set, get) => ({
    entries: api.listEntries(),
    selected: 0,
    inputMode: 'normal',
    accountInput: '',
    passwordInput: '',
    feedback: null,
    quitRequested: false,

    selectNext: () =>
      set((s) => {
        if (s.entries.length === 0) return {}
        return { selected: s.selected < s.entries.length - 1 ? s.selected + 1 : 0 }
      }),

    selectPrevious: () =>
      set((s) => {
        if (s.entries.length === 0) return {}
        return { selected: s.selected > 0 ? s.selected - 1 : s.entries.length - 1 }
      }),

    startAdding: () => set({ inputMode: 'editing_account' }),

    typeChar: (char) =>
      set((s) => {
        switch (s.inputMode) {
          case 'editing_account':
            return { accountInput: s.accountInput + char }
          case 'editing_password':
            return { passwordInput: s.passwordInput + char }
          case 'normal':
            return {}
        }
      }),

    deleteChar: () =>
      set((s) => {
        switch (s.inputMode) {
          case 'editing_account':
            return { accountInput: Array.from(s.accountInput).slice(0, -1).join('') }
          case 'editing_password':
            return { passwordInput: Array.from(s.passwordInput).slice(0, -1).join('') }
          case 'normal':
            return {}
        }
      }),

    cancelInput: () => set({ inputMode: 'normal', accountInput: '', passwordInput: '' }),

    confirmInput: () => {
      const { inputMode, accountInput, passwordInput } = get()
      if (inputMode === 'editing_account') {
        set({ inputMode: 'editing_password' })
        return
      }
      if (inputMode !== 'editing_password') return

      const result = api.addEntry(accountInput, passwordInput)
      if (result.success) {
        set({
          entries: api.listEntries(),
          inputMode: 'normal',
          accountInput: '',
          passwordInput: '',
          feedback: { text: MESSAGES.added, kind: 'success' }
        })
        return
      }

      if (result.error.code === 'IO_ERROR') {
        // The entry is in memory even though the file write failed.
        set({
          entries: api.listEntries(),
          inputMode: 'normal',
          accountInput: '',
          passwordInput: '',
          feedback: { text: MESSAGES.saveFailed(result.error.message), kind: 'error' }
        })
        return
      }

      set({ feedback: { text: result.error.message, kind: 'error' } })
    },

    revealSelected: () => {
      const { entries, selected } = get()
      const entry = entries[selected]
      if (!entry) return

      const result = api.revealPassword(selected)
      set({
        feedback: result.success
          ? { text: MESSAGES.revealed(entry.account, result.data), kind: 'info' }
          : { text: result.error.message, kind: 'error' }
      })
    },

    requestQuit: () => set({ quitRequested: true })
  }))
}
