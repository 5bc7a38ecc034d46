/**
 * Vault type definitions for the encrypted credential store.
 *
 * These types are shared by the key deriver, cipher engine, payload codec
 * and credential store to describe stored entries and encrypted payloads.
 */

/** A password read from disk in the legacy, unencrypted form. */
export interface PlainField {
  kind: 'plain'
  value: string
}

/** A password in the `<b64 nonce>:<b64 ciphertext‖tag>` on-disk encoding. */
export interface EncryptedField {
  kind: 'encrypted'
  payload: string
}

/** Classification of a raw password field as found on disk. */
export type PasswordField = PlainField | EncryptedField

/** One stored credential. Passwords held in memory are always encrypted. */
export interface Entry {
  account: string
  password: EncryptedField
}

/**
 * Decoded form of an {@link EncryptedField} payload.
 *
 * `ciphertext` carries the 16-byte GCM authentication tag at its end.
 */
export interface DecodedPayload {
  /** 12-byte nonce. */
  nonce: Buffer
  ciphertext: Buffer
}

/** Result of reading the backing file. */
export interface LoadResult {
  entries: Entry[]
  /** True when at least one legacy plaintext password was encrypted during load. */
  migrated: boolean
}
