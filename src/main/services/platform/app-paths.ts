import { mkdirSync } from 'fs'
import { join } from 'path'
import { homedir, platform } from 'os'

const APP_NAME = 'Lockwell'
const APP_NAME_LOWER = 'lockwell'

export const DEFAULT_VAULT_FILE_NAME = 'vault.dat'
export const QUARANTINE_SUFFIX = '.corrupted'

/**
 * Resolves the platform-specific base directory for application data.
 *
 * - macOS:   ~/Library/Application Support/Lockwell/
 * - Windows: %APPDATA%\Lockwell\
 * - Linux:   $XDG_CONFIG_HOME/lockwell/ (default ~/.config/lockwell/)
 *
 * @returns Absolute path to the app data root directory.
 */
export function resolveBaseDataDir(
  env: NodeJS.ProcessEnv = process.env,
  os: NodeJS.Platform = platform(),
  home: string = homedir()
): string {
  switch (os) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_NAME)
    case 'win32':
      return join(env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), APP_NAME)
    default:
      return join(env['XDG_CONFIG_HOME'] ?? join(home, '.config'), APP_NAME_LOWER)
  }
}

/**
 * Ensures a directory exists, creating it recursively if necessary.
 *
 * @param dirPath - Absolute path to the directory.
 * @returns The same path, guaranteed to exist on disk.
 */
export function ensureDir(dirPath: string): string {
  try {
    mkdirSync(dirPath, { recursive: true })
  } catch (err) {
    throw new Error(
      `Failed to create directory "${dirPath}": ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  }
  return dirPath
}

/** `<dataDir>/<fileName>` */
export function vaultFilePath(dataDir: string, fileName: string = DEFAULT_VAULT_FILE_NAME): string {
  return join(dataDir, fileName)
}

/** Sibling path a corrupted vault is renamed to. */
export function quarantinePathFor(vaultPath: string): string {
  return `${vaultPath}${QUARANTINE_SUFFIX}`
}

/** `<dataDir>/logs` */
export function logsDirFor(dataDir: string): string {
  return join(dataDir, 'logs')
}
