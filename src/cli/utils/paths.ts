import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

const APP_DIR = 'codelore';

/**
 * Expand a leading `~` and make the path absolute, so a relative
 * CODELORE_HOME names one directory whatever the working directory is.
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(2));
  }
  return resolve(path);
}

function platformDataDir(env: NodeJS.ProcessEnv): string {
  const home = homedir();
  if (process.platform === 'darwin') {
    return join(home, 'Library', 'Application Support');
  }
  if (process.platform === 'win32') {
    return env['APPDATA'] || join(home, 'AppData', 'Roaming');
  }
  const xdgDataHome = env['XDG_DATA_HOME']?.trim();
  return xdgDataHome ? expandHome(xdgDataHome) : join(home, '.local', 'share');
}

/**
 * Directory holding codelore's configuration: CODELORE_HOME when it is set
 * and not blank, else `codelore` under the platform's data directory
 * (XDG_DATA_HOME or ~/.local/share, ~/Library/Application Support, %APPDATA%).
 */
export function getCodeloreHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['CODELORE_HOME']?.trim();
  if (override) {
    return expandHome(override);
  }
  return join(platformDataDir(env), APP_DIR);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getCodeloreHome(env), 'config.json');
}
