import { mkdirSync, chmodSync } from 'fs'
import { join } from 'path'
import { homedir, platform } from 'os'

const APP_NAME = 'AssetJobCore'
const APP_NAME_LOWER = 'asset-job-core'

/** Owner-only directory mode used for every directory holding secrets or usage state. */
export const PRIVATE_DIR_MODE = 0o700

/**
 * Resolves the platform-specific base directory for application data.
 *
 * - macOS:   ~/Library/Application Support/AssetJobCore/
 * - Windows: %APPDATA%\AssetJobCore\
 * - Linux:   ~/.local/share/asset-job-core/
 *
 * @throws If the current platform is unsupported.
 */
export function resolveDefaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = homedir()
  const os = platform()

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
 * Ensures a directory exists with owner-only permissions, creating it
 * recursively if necessary. An existing directory is tightened to `0700`.
 *
 * @returns The same path, guaranteed to exist on disk.
 */
export function ensurePrivateDir(dirPath: string): string {
  try {
    mkdirSync(dirPath, { recursive: true, mode: PRIVATE_DIR_MODE })
    if (platform() !== 'win32') {
      chmodSync(dirPath, PRIVATE_DIR_MODE)
    }
  } catch (err) {
    throw new Error(
      `Failed to create directory "${dirPath}": ${err instanceof Error ? err.message : String(err)}`
    )
  }
  return dirPath
}

/**
 * Directory holding the encrypted credential record.
 *
 * @returns `<dataDir>/vault/`
 */
export function getVaultPath(dataDir: string): string {
  return join(dataDir, 'vault')
}

/**
 * Directory holding the persisted usage counter.
 *
 * @returns `<dataDir>/usage/`
 */
export function getUsagePath(dataDir: string): string {
  return join(dataDir, 'usage')
}

/**
 * Directory for flushed log ring snapshots.
 *
 * @returns `<dataDir>/logs/`
 */
export function getLogsPath(dataDir: string): string {
  return join(dataDir, 'logs')
}
