import path from 'node:path';
import { APP_NAME, WINDOWS_APP_DIR } from './constants.js';

export function getWindowsInstallDir(env: NodeJS.ProcessEnv): string {
  const base = env.LOCALAPPDATA || env.APPDATA;
  if (base) {
    return path.win32.join(base, WINDOWS_APP_DIR);
  }

  return path.win32.join('C:\\', WINDOWS_APP_DIR);
}

export function getPosixInstallDir(env: NodeJS.ProcessEnv): string {
  const home = env.HOME;
  if (home) {
    return path.posix.join(home, '.local', 'bin');
  }

  return path.posix.join('/tmp', APP_NAME);
}
