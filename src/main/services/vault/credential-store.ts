/**
 * Credential store backed by a flat `account,payload` text file.
 *
 * Every password on disk is expected in the encrypted payload format. Legacy
 * plaintext passwords found while loading are encrypted in memory and the
 * caller is told to write the file back. Saving rewrites the whole file in
 * place: there is no temp-file rename and no lock, so concurrent writers can
 * overwrite each other.
 */

import { EOL } from 'os'
import { existsSync, readFileSync, writeFileSync } from 'fs'
import { TextDecoder } from 'util'
import { LogRing } from '../diagnostics/log-ring'
import { CipherEngine } from './crypto'
import { StoreIOError, errorMessage } from './errors'
import { classify } from './payload-codec'
import type { Entry, LoadResult } from './types'

export const FIELD_SEPARATOR = ','

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Splits a record line at the first field separator. Accounts containing a
 * comma therefore lose everything after it to the password field.
 */
function parseLine(line: string): [account: string, rawPassword: string] | null {
  const index = line.indexOf(FIELD_SEPARATOR)
  if (index < 0) return null
  return [line.slice(0, index), line.slice(index + FIELD_SEPARATOR.length)]
}

/**
 * @example
 * ```ts
 * const store = new CredentialStore('/home/me/passwords.txt', cipher)
 * const { entries, migrated } = store.load()
 * if (migrated) store.save(entries)
 * ```
 */
export class CredentialStore {
  private readonly logger = LogRing.getInstance()

  constructor(
    readonly filePath: string,
    private readonly cipher: CipherEngine
  ) {}

  /**
   * Reads every entry from the backing file.
   *
   * Lines without a field separator are skipped. Passwords that do not look
   * encrypted are encrypted now and reported through `migrated`.
   *
   * @returns An empty, non-migrated result when the file does not exist.
   * @throws {StoreIOError} If the file cannot be read or is not valid UTF-8.
   * @throws {EncryptionError} If a legacy password cannot be encrypted.
   */
  load(): LoadResult {
    if (!existsSync(this.filePath)) {
      this.logger.info('Credential file not found, starting empty', { path: this.filePath })
      return { entries: [], migrated: false }
    }

    let raw: Buffer
    try {
      raw = readFileSync(this.filePath)
    } catch (err) {
      throw new StoreIOError('read', `Failed to read "${this.filePath}": ${errorMessage(err)}`, err)
    }

    let content: string
    try {
      content = utf8Decoder.decode(raw)
    } catch (err) {
      throw new StoreIOError('read', `Failed to read "${this.filePath}": file is not valid UTF-8`, err)
    }

    const entries: Entry[] = []
    let migrated = false
    let skipped = 0

    for (const rawLine of content.split('\n')) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
      const parts = parseLine(line)
      if (!parts) {
        if (line.length > 0) skipped++
        continue
      }

      const [account, rawPassword] = parts
      const field = classify(rawPassword)

      switch (field.kind) {
        case 'encrypted':
          entries.push({ account, password: field })
          break
        case 'plain':
          entries.push({
            account,
            password: { kind: 'encrypted', payload: this.cipher.encrypt(field.value) }
          })
          migrated = true
          this.logger.info(`Encrypted legacy password for account "${account}"`)
          break
      }
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} malformed line(s)`, { path: this.filePath })
    }
    this.logger.info('Entries loaded', { count: entries.length, migrated })

    return { entries, migrated }
  }

  /**
   * Overwrites the backing file with one `account,payload` line per entry.
   *
   * @throws {StoreIOError} If the file cannot be written.
   */
  save(entries: readonly Entry[]): void {
    const content = entries
      .map((entry) => `${entry.account}${FIELD_SEPARATOR}${entry.password.payload}${EOL}`)
      .join('')

    try {
      writeFileSync(this.filePath, content, { encoding: 'utf-8' })
    } catch (err) {
      throw new StoreIOError('write', `Failed to write "${this.filePath}": ${errorMessage(err)}`, err)
    }

    this.logger.info('Entries saved', { count: entries.length })
  }
}
