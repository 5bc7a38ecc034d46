import { join } from 'path'
import { homedir, platform } from 'os'

const APP_NAME = 'Passvault'
const APP_NAME_LOWER = 'passvault'

/**
 * Resolves the platform-specific base directory for application data.
 *
 * - macOS:   ~/Library/Application Support/Passvault/
 * - Windows: %APPDATA%\Passvault\
 * - Linux:   ~/.local/share/passvault/
 *
 * @throws If the current platform is unsupported.
 */
export function resolveBaseDataDir(
  os: NodeJS.Platform = platform(),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  switch (os) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_NAME)
    case 'win32':
      return join(env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), APP_NAME)
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return join(env['XDG_DATA_HOME'] ?? join(home, '.local', 'share'), APP_NAME_LOWER)
    default:
      throw new Error(`Unsupported platform: ${os}`)
  }
}

/**
 * Path to application log files, `<appData>/logs/`. Not created until a
 * flush actually writes there.
 */
export function getLogsPath(): string {
  return join(resolveBaseDataDir(), 'logs')
}
