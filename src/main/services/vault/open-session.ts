import { LogRing } from '../diagnostics/log-ring'
import { CipherEngine } from './crypto'
import { CredentialStore } from './credential-store'
import { VaultError } from './errors'
import { VaultSession } from './vault-session'
import type { LoadResult } from './types'

export interface OpenedSession {
  session: VaultSession
  /** Operator-facing messages for problems that did not stop startup. */
  warnings: string[]
}

/**
 * Loads the credential file into a new session.
 *
 * A file that cannot be read leaves the session empty. Entries migrated from
 * plaintext are written back immediately so the file converges on the
 * encrypted format; if that write fails the session still opens.
 *
 * @throws Anything that is not a {@link VaultError}.
 */
export function openSession(dataFile: string, cipher: CipherEngine): OpenedSession {
  const logger = LogRing.getInstance()
  const store = new CredentialStore(dataFile, cipher)
  const warnings: string[] = []

  let loaded: LoadResult = { entries: [], migrated: false }
  try {
    loaded = store.load()
  } catch (err) {
    if (!(err instanceof VaultError)) throw err
    logger.error('Failed to load entries', err)
    warnings.push(`Error loading entries: ${err.message}`)
  }

  if (loaded.migrated) {
    try {
      store.save(loaded.entries)
      logger.info('Migrated entries written back', { count: loaded.entries.length })
    } catch (err) {
      if (!(err instanceof VaultError)) throw err
      logger.error('Failed to re-save migrated entries', err)
      warnings.push(`Error re-saving encrypted entries: ${err.message}`)
    }
  }

  return { session: new VaultSession(store, cipher, loaded.entries), warnings }
}
