import type { VaultResult } from '@shared/vault-result'
import type { Entry } from '../../main/services/vault/types'

/**
 * The three verbs the terminal front end uses to reach the vault.
 * {@link VaultSession} satisfies it; tests pass in-memory fakes.
 */
export interface VaultApi {
  listEntries(): readonly Entry[]
  addEntry(account: string, password: string): VaultResult<void>
  revealPassword(index: number): VaultResult<string>
}

export type { Entry }
