import { LogRing } from './services/diagnostics/log-ring'
import { errorMessage } from './services/vault/errors'
import { openSession } from './services/vault/open-session'
import { flushLogs, startVault } from './startup'
import { createVaultStore } from '../renderer/store/vault.store'
import { TerminalApp } from '../renderer/terminal'

const logger = LogRing.getInstance()

/** Set once configuration has loaded; until then logs go to the default directory. */
let logDir: string | undefined

async function main(): Promise<number> {
  const started = startVault()
  if (!started) return 1

  const { config, cipher } = started
  logDir = config.logDir

  const { session, warnings } = openSession(config.dataFile, cipher)
  for (const warning of warnings) {
    console.error(warning)
  }

  try {
    await new TerminalApp(createVaultStore(session)).run()
  } catch (err) {
    logger.error('Terminal UI failed', err)
    console.error(errorMessage(err))
    flushLogs(logDir)
    return 1
  }

  logger.info('Passvault exiting')
  if (config.debug) {
    flushLogs(logDir)
  }
  return 0
}

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', err)
  console.error(err)
  flushLogs(logDir)
  process.exit(1)
})

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logger.error('Fatal error', err)
    console.error(err)
    flushLogs(logDir)
    process.exitCode = 1
  }
)
