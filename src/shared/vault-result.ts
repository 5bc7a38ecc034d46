/**
 * Result envelope returned by the vault session to the presentation layer.
 */

export interface VaultFailure {
  success: false
  error: {
    code: string
    message: string
  }
}

export interface VaultSuccess<T> {
  success: true
  data: T
}

export type VaultResult<T = void> = VaultSuccess<T> | VaultFailure

export function ok<T>(data: T): VaultSuccess<T> {
  return { success: true, data }
}

export function fail(code: string, message: string): VaultFailure {
  return { success: false, error: { code, message } }
}
