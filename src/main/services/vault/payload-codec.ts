/**
 * On-disk encoding of encrypted passwords: `<base64 nonce>:<base64 ciphertext>`.
 *
 * This module is the single place that inspects raw password text. Everything
 * else works with the {@link PasswordField} union it produces.
 */

import { z } from 'zod'
import { FormatError } from './errors'
import type { DecodedPayload, PasswordField } from './types'

export const PAYLOAD_SEPARATOR = ':'
export const NONCE_LENGTH = 12

const Base64Schema = z.string().base64()

/**
 * Splits on the first separator only; the ciphertext half may itself contain
 * further separators, which makes decoding fail later.
 */
function splitOnce(value: string): [string, string] | null {
  const index = value.indexOf(PAYLOAD_SEPARATOR)
  if (index < 0) return null
  return [value.slice(0, index), value.slice(index + PAYLOAD_SEPARATOR.length)]
}

function decodeBase64(value: string, part: 'nonce' | 'ciphertext'): Buffer {
  if (!Base64Schema.safeParse(value).success) {
    throw new FormatError(`Encrypted ${part} is not valid base64.`)
  }
  const bytes = Buffer.from(value, 'base64')
  // Non-zero padding bits decode without complaint; only the canonical form is accepted.
  if (bytes.toString('base64') !== value) {
    throw new FormatError(`Encrypted ${part} is not valid base64.`)
  }
  return bytes
}

/**
 * Classifies a raw password field read from disk.
 *
 * A field counts as encrypted when it contains the separator with non-empty
 * text on both sides of the first occurrence. This is a shape check only: a
 * legacy password such as `a:b` is taken to be encrypted.
 *
 * @example
 * ```ts
 * classify('YWJj:ZGVm') // { kind: 'encrypted', payload: 'YWJj:ZGVm' }
 * classify('abc:')      // { kind: 'plain', value: 'abc:' }
 * ```
 */
export function classify(raw: string): PasswordField {
  const parts = splitOnce(raw)
  if (parts && parts[0].length > 0 && parts[1].length > 0) {
    return { kind: 'encrypted', payload: raw }
  }
  return { kind: 'plain', value: raw }
}

/**
 * Encodes a nonce and ciphertext (tag included) as payload text.
 */
export function encode(nonce: Uint8Array, ciphertext: Uint8Array): string {
  const encodedNonce = Buffer.from(nonce).toString('base64')
  const encodedCipher = Buffer.from(ciphertext).toString('base64')
  return `${encodedNonce}${PAYLOAD_SEPARATOR}${encodedCipher}`
}

/**
 * Parses payload text back into its nonce and ciphertext bytes.
 *
 * @throws {FormatError} When the separator is missing, either half is not
 *   canonical padded base64, or the nonce is not {@link NONCE_LENGTH} bytes.
 */
export function decode(payload: string): DecodedPayload {
  const parts = splitOnce(payload)
  if (!parts) {
    throw new FormatError('Encrypted data format is invalid.')
  }

  const nonce = decodeBase64(parts[0], 'nonce')
  if (nonce.length !== NONCE_LENGTH) {
    throw new FormatError(`Nonce length is invalid: expected ${NONCE_LENGTH} bytes, got ${nonce.length}.`)
  }
  const ciphertext = decodeBase64(parts[1], 'ciphertext')

  return { nonce, ciphertext }
}
