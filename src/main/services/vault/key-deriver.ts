/**
 * Passphrase to key derivation for the credential vault.
 *
 * The key is the SHA-256 digest of the passphrase bytes. There is no salt and
 * no iteration count, so a passphrase always maps to the same key and files
 * written by one process can be read by any other given the same passphrase.
 */

import { createHash } from 'crypto'
import { ConfigError } from './errors'

export const KEY_LENGTH = 32

/**
 * Derives the 32-byte vault key from the operator passphrase.
 *
 * @param passphrase - Raw passphrase, or `undefined` when no source provided one.
 * @returns The SHA-256 digest of the UTF-8 passphrase.
 * @throws {ConfigError} `missing` when no passphrase was supplied, `empty` when it is blank.
 *
 * @example
 * ```ts
 * const key = deriveKey(config.passphrase)
 * const cipher = new CipherEngine(key)
 * ```
 */
export function deriveKey(passphrase: string | undefined): Buffer {
  if (passphrase === undefined) {
    throw new ConfigError('missing', 'Environment variable PASSWORD_MANAGER_KEY is not set.')
  }
  if (passphrase.trim().length === 0) {
    throw new ConfigError('empty', 'PASSWORD_MANAGER_KEY must not be empty.')
  }

  return createHash('sha256').update(passphrase, 'utf8').digest()
}
