/**
 * Process configuration: `.env` loading and validation.
 *
 * This is the only module that reads the environment. The entry point calls
 * {@link loadConfig} once and passes the resulting values down explicitly.
 */

import { parse as parseDotenv } from 'dotenv'
import { existsSync, readFileSync } from 'fs'
import { join, resolve } from 'path'
import { EnvSchema, type AppConfig } from '@shared/schemas/env.schema'
import { ConfigError } from '../vault/errors'
import { LogRing } from '../diagnostics/log-ring'
import { getLogsPath } from './app-paths'

export interface LoadConfigOptions {
  /** Directory holding `.env` and against which relative paths resolve. */
  cwd?: string
  /** Environment to read and to populate from `.env`. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv
}

function applyDotenv(path: string, env: NodeJS.ProcessEnv, logger: LogRing): void {
  if (!existsSync(path)) {
    logger.debug('No .env file found', { path })
    return
  }

  let parsed: Record<string, string>
  try {
    parsed = parseDotenv(readFileSync(path, { encoding: 'utf-8' }))
  } catch (err) {
    throw new ConfigError(
      'invalid',
      `Failed to read "${path}": ${err instanceof Error ? err.message : String(err)}`
    )
  }

  for (const [name, value] of Object.entries(parsed)) {
    if (env[name] === undefined) {
      env[name] = value
    }
  }
  logger.debug('Loaded .env file', { path, variables: Object.keys(parsed).length })
}

/**
 * Loads `.env` from the working directory (existing variables win) and
 * validates the result.
 *
 * @throws {ConfigError} kind `invalid` when a variable fails validation.
 *
 * @example
 * ```ts
 * const config = loadConfig()
 * const key = deriveKey(config.passphrase)
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const logger = LogRing.getInstance()
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env

  applyDotenv(join(cwd, '.env'), env, logger)

  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError('invalid', `Invalid configuration: ${issues}`)
  }

  const dataFile = parsed.data.PASSWORD_MANAGER_FILE
  const logDir = parsed.data.PASSWORD_MANAGER_LOG_DIR

  return {
    passphrase: parsed.data.PASSWORD_MANAGER_KEY,
    dataFile: resolve(cwd, dataFile),
    debug: parsed.data.PASSWORD_MANAGER_DEBUG,
    logDir: logDir ? resolve(cwd, logDir) : getLogsPath()
  }
}
