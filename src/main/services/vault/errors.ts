/**
 * Error taxonomy for the credential vault.
 *
 * Every failure raised by the vault services is a {@link VaultError} with a
 * stable `code`, so callers can branch on the kind and still show `message`
 * to the operator.
 */

export type VaultErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_EMPTY'
  | 'CONFIG_INVALID'
  | 'ENCRYPTION_FAILED'
  | 'DECRYPTION_MALFORMED'
  | 'DECRYPTION_AUTH_FAILED'
  | 'DECRYPTION_NOT_UTF8'
  | 'FORMAT_INVALID'
  | 'IO_ERROR'
  | 'VALIDATION_FAILED'
  | 'ENTRY_NOT_FOUND'

export abstract class VaultError extends Error {
  abstract readonly code: VaultErrorCode

  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message)
  }
}

export type ConfigErrorKind = 'missing' | 'empty' | 'invalid'

/** Passphrase or configuration problem detected at startup. Fatal. */
export class ConfigError extends VaultError {
  override readonly name = 'ConfigError' as const

  constructor(
    readonly kind: ConfigErrorKind,
    message: string
  ) {
    super(message)
  }

  get code(): VaultErrorCode {
    switch (this.kind) {
      case 'missing':
        return 'CONFIG_MISSING'
      case 'empty':
        return 'CONFIG_EMPTY'
      case 'invalid':
        return 'CONFIG_INVALID'
    }
  }
}

export class EncryptionError extends VaultError {
  override readonly name = 'EncryptionError' as const
  readonly code = 'ENCRYPTION_FAILED' as const
}

export type DecryptionErrorKind = 'malformed' | 'auth_failed' | 'not_utf8'

/** Raised when a stored payload cannot be turned back into a password. */
export class DecryptionError extends VaultError {
  override readonly name = 'DecryptionError' as const

  constructor(
    readonly kind: DecryptionErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause)
  }

  get code(): VaultErrorCode {
    switch (this.kind) {
      case 'malformed':
        return 'DECRYPTION_MALFORMED'
      case 'auth_failed':
        return 'DECRYPTION_AUTH_FAILED'
      case 'not_utf8':
        return 'DECRYPTION_NOT_UTF8'
    }
  }
}

/** Payload text does not follow the `<b64 nonce>:<b64 ciphertext>` shape. */
export class FormatError extends VaultError {
  override readonly name = 'FormatError' as const
  readonly code = 'FORMAT_INVALID' as const
  readonly kind = 'invalid' as const
}

/** Backing file could not be read or written. */
export class StoreIOError extends VaultError {
  override readonly name = 'StoreIOError' as const
  readonly code = 'IO_ERROR' as const

  constructor(
    readonly operation: 'read' | 'write',
    message: string,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

export class ValidationError extends VaultError {
  override readonly name = 'ValidationError' as const

  constructor(
    readonly code: 'VALIDATION_FAILED' | 'ENTRY_NOT_FOUND',
    message: string
  ) {
    super(message)
  }
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
