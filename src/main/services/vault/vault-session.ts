/**
 * Collaborator-facing façade over the credential store.
 *
 * Owns the in-memory entry list for the lifetime of the process. Every
 * operation returns a {@link VaultResult}: vault failures come back as
 * `{ success: false, error: { code, message } }` and never escape as
 * exceptions, so the presentation layer can show them as feedback.
 */

import { fail, ok, type VaultResult } from '@shared/vault-result'
import { LogRing } from '../diagnostics/log-ring'
import { CipherEngine } from './crypto'
import { CredentialStore } from './credential-store'
import { ValidationError, VaultError } from './errors'
import type { Entry } from './types'

/**
 * @example
 * ```ts
 * const session = new VaultSession(store, cipher, entries)
 * const added = session.addEntry('gmail', 's3cr3t')
 * if (!added.success) console.error(added.error.message)
 * session.revealPassword(0) // { success: true, data: 's3cr3t' }
 * ```
 */
export class VaultSession {
  private readonly logger = LogRing.getInstance()
  private readonly entries: Entry[]

  constructor(
    private readonly store: CredentialStore,
    private readonly cipher: CipherEngine,
    entries: readonly Entry[] = []
  ) {
    this.entries = [...entries]
  }

  /** Snapshot of the current entries; later mutations do not affect it. */
  listEntries(): readonly Entry[] {
    return this.entries.map((entry) => ({ account: entry.account, password: { ...entry.password } }))
  }

  /**
   * Encrypts and appends a new entry, then rewrites the backing file.
   *
   * Both inputs are trimmed and must be non-empty. When only the save fails
   * the entry stays in memory and the failure carries `IO_ERROR`; call
   * {@link persist} to retry.
   */
  addEntry(account: string, password: string): VaultResult<void> {
    return this.run('addEntry', () => {
      const trimmedAccount = account.trim()
      const trimmedPassword = password.trim()
      if (trimmedAccount.length === 0 || trimmedPassword.length === 0) {
        throw new ValidationError('VALIDATION_FAILED', 'Account or password must not be empty.')
      }

      const payload = this.cipher.encrypt(trimmedPassword)
      this.entries.push({ account: trimmedAccount, password: { kind: 'encrypted', payload } })
      this.logger.info(`Entry added for account "${trimmedAccount}"`)

      this.store.save(this.entries)
      return undefined
    })
  }

  /**
   * Decrypts the password of the entry at `index` for display.
   */
  revealPassword(index: number): VaultResult<string> {
    return this.run('revealPassword', () => {
      const entry = Number.isInteger(index) ? this.entries[index] : undefined
      if (!entry) {
        throw new ValidationError('ENTRY_NOT_FOUND', `No entry at position ${index}.`)
      }
      return this.cipher.decrypt(entry.password.payload)
    })
  }

  /** Rewrites the backing file from the in-memory entries. */
  persist(): VaultResult<void> {
    return this.run('persist', () => {
      this.store.save(this.entries)
      return undefined
    })
  }

  private run<T>(operation: string, action: () => T): VaultResult<T> {
    try {
      return ok(action())
    } catch (err) {
      if (err instanceof VaultError) {
        this.logger.warn(`Vault operation "${operation}" failed`, { code: err.code, error: err.message })
        return fail(err.code, err.message)
      }
      this.logger.error(`Unexpected failure in vault operation "${operation}"`, err)
      throw err
    }
  }
}
