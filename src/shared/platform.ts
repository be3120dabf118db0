import os from 'node:os';
import path from 'node:path';

export type Platform = 'mac' | 'windows' | 'linux' | 'unknown';

/**
 * Get the current platform
 */
export function getPlatform(): Platform {
  switch (process.platform) {
    case 'darwin':
      return 'mac';
    case 'win32':
      return 'windows';
    case 'linux':
      return 'linux';
    default:
      return 'unknown';
  }
}

/**
 * Get platform-specific application data directory
 * - macOS: ~/Library/Application Support
 * - Windows: %APPDATA%
 * - Linux: ~/.config
 */
export function getAppDataPath(): string {
  switch (getPlatform()) {
    case 'mac':
      return path.join(os.homedir(), 'Library', 'Application Support');
    case 'windows':
      return process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    case 'linux':
      return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
    default:
      return path.join(os.homedir(), '.config');
  }
}

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}
