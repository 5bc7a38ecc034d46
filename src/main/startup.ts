import { LogRing } from './services/diagnostics/log-ring'
import { getLogsPath } from './services/platform/app-paths'
import { loadConfig, type LoadConfigOptions } from './services/platform/env-config'
import { CipherEngine } from './services/vault/crypto'
import { VaultError, errorMessage } from './services/vault/errors'
import { deriveKey } from './services/vault/key-deriver'
import type { AppConfig } from '@shared/schemas/env.schema'

export interface StartedVault {
  config: AppConfig
  cipher: CipherEngine
}

/**
 * Writes the log ring to `logDir`, or to the platform log directory when
 * configuration never loaded. Failures are reported on stderr only.
 *
 * @returns The written file, or `null` when flushing failed.
 */
export function flushLogs(logDir: string | undefined): string | null {
  try {
    const path = LogRing.getInstance().flush(logDir ?? getLogsPath())
    console.error(`Logs written to ${path}`)
    return path
  } catch (err) {
    console.error(errorMessage(err))
    return null
  }
}

/**
 * Loads configuration and builds the cipher.
 *
 * A {@link VaultError} on the way is printed to stderr, the logs are
 * flushed, and `null` is returned so the caller can exit with status 1.
 */
export function startVault(options: LoadConfigOptions = {}): StartedVault | null {
  const logger = LogRing.getInstance()
  let logDir: string | undefined

  try {
    const config = loadConfig(options)
    logDir = config.logDir
    return { config, cipher: new CipherEngine(deriveKey(config.passphrase)) }
  } catch (err) {
    if (!(err instanceof VaultError)) throw err
    logger.error('Startup failed', { code: err.code, error: err.message })
    console.error(err.message)
    flushLogs(logDir)
    return null
  }
}
