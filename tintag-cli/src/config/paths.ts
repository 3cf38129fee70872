/**
 * Config path resolution.
 */

import * as path from 'path';
import * as os from 'os';

/**
 * Gets the tintag config directory.
 * ~/.config/tintag on Unix, %APPDATA%/tintag on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'tintag');
  }
  return path.join(os.homedir(), '.config', 'tintag');
}

/**
 * Gets the path of the config file used when `--config` is not given.
 * e.g., ~/.config/tintag/config.json
 */
export function getDefaultConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}
