/**
 * Centralized tally directory path management
 *
 * @purpose Single source of truth for the config and wallet locations
 */

import { homedir, platform } from 'os'
import { join } from 'path'

/**
 * Get XDG config home directory (cross-platform)
 */
function getConfigHome(): string {
  if (platform() === 'win32') {
    return process.env.APPDATA || join(homedir(), 'AppData', 'Roaming')
  }
  return process.env.XDG_CONFIG_HOME || join(homedir(), '.config')
}

/**
 * Get XDG data home directory (cross-platform)
 */
function getDataHome(): string {
  if (platform() === 'win32') {
    return process.env.LOCALAPPDATA || join(homedir(), 'AppData', 'Local')
  }
  return process.env.XDG_DATA_HOME || join(homedir(), '.local', 'share')
}

/**
 * XDG Base Directory paths for tally
 * TALLY_CONFIG_DIR wins over the XDG default for the config directory.
 */
export const TALLY_PATHS = {
  // ~/.config/tally/ (or %APPDATA%/tally/ on Windows)
  config: process.env.TALLY_CONFIG_DIR || join(getConfigHome(), 'tally'),

  // ~/.local/share/tally/ (or %LOCALAPPDATA%/tally/ on Windows)
  data: join(getDataHome(), 'tally'),
} as const

export const TALLY_FILES = {
  defaultWallet: process.env.TALLY_WALLET_PATH || join(TALLY_PATHS.data, 'wallets', 'default_wallet.json'),
} as const

export const DEFAULT_API_URL = 'https://api.tally.dev'

export function getApiUrl(): string {
  return process.env.TALLY_API_URL || DEFAULT_API_URL
}
