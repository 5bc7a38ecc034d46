/**
 * AES-256-GCM encryption and decryption of individual passwords.
 *
 * All operations use the Node.js built-in `crypto` module. Each encryption
 * call draws a fresh random 12-byte nonce, so encrypting the same password
 * twice never yields the same payload.
 */

import { randomBytes, createCipheriv, createDecipheriv } from 'crypto'
import { TextDecoder } from 'util'
import { DecryptionError, EncryptionError, FormatError, errorMessage } from './errors'
import { KEY_LENGTH } from './key-deriver'
import { NONCE_LENGTH, decode, encode } from './payload-codec'
import type { DecodedPayload } from './types'

const ALGORITHM = 'aes-256-gcm'
const AUTH_TAG_LENGTH = 16

const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

function decodePayload(payload: string): DecodedPayload {
  try {
    return decode(payload)
  } catch (err) {
    if (err instanceof FormatError) {
      throw new DecryptionError('malformed', err.message, err)
    }
    throw err
  }
}

/**
 * Authenticated cipher bound to a single vault key.
 *
 * @example
 * ```ts
 * const cipher = new CipherEngine(deriveKey('correct-horse'))
 * const payload = cipher.encrypt('s3cr3t') // "<b64 nonce>:<b64 ciphertext>"
 * cipher.decrypt(payload)                  // "s3cr3t"
 * ```
 */
export class CipherEngine {
  private readonly key: Buffer

  /**
   * @param key - 32-byte key, normally from {@link deriveKey}.
   * @throws {EncryptionError} If the key is not exactly 32 bytes.
   */
  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new EncryptionError(`Key must be ${KEY_LENGTH} bytes, got ${key.length}`)
    }
    this.key = Buffer.from(key)
  }

  /**
   * Encrypts a password and returns its payload encoding.
   *
   * @throws {EncryptionError} If the cipher backend fails.
   */
  encrypt(plaintext: string): string {
    const nonce = randomBytes(NONCE_LENGTH)

    try {
      const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_LENGTH })
      const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
      return encode(nonce, Buffer.concat([encrypted, cipher.getAuthTag()]))
    } catch (err) {
      throw new EncryptionError(`Failed to encrypt password: ${errorMessage(err)}`, err)
    }
  }

  /**
   * Decrypts a payload produced by {@link encrypt}.
   *
   * Plaintext is only returned once the authentication tag has verified.
   *
   * @throws {DecryptionError} `malformed` for unparseable payloads, `auth_failed`
   *   when the tag does not verify, `not_utf8` when the plaintext is not UTF-8.
   */
  decrypt(payload: string): string {
    const { nonce, ciphertext } = decodePayload(payload)

    if (ciphertext.length < AUTH_TAG_LENGTH) {
      throw new DecryptionError('auth_failed', 'Failed to decrypt password.')
    }

    const body = ciphertext.subarray(0, ciphertext.length - AUTH_TAG_LENGTH)
    const authTag = ciphertext.subarray(ciphertext.length - AUTH_TAG_LENGTH)

    let decrypted: Buffer
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_LENGTH })
      decipher.setAuthTag(authTag)
      decrypted = Buffer.concat([decipher.update(body), decipher.final()])
    } catch (err) {
      throw new DecryptionError('auth_failed', 'Failed to decrypt password.', err)
    }

    try {
      return utf8Decoder.decode(decrypted)
    } catch (err) {
      throw new DecryptionError('not_utf8', 'Decrypted password is not valid UTF-8.', err)
    }
  }
}
