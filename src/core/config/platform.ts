// src/core/config/platform.ts
import path from 'node:path';
import { TOOL_NAME, WINDOWS_APP_DIR } from './constants.js';
import { getPosixInstallDir, getWindowsInstallDir } from './app-dirs.js';

export type PlatformFamily = 'windows' | 'macos' | 'linux';

/**
 * Everything the locator and installer need to know about the host OS.
 * One profile per platform family; paths are built with that family's own
 * separator so profiles behave the same whichever OS runs the code.
 */
export interface HostPlatform {
  readonly family: PlatformFamily;
  /** File name published on the release page and used for installs */
  readonly downloadName: string;
  /** Names searched for on PATH */
  readonly commandNames: readonly string[];
  readonly pathDelimiter: string;
  readonly wellKnownLocations: readonly string[];
  join(...segments: string[]): string;
  defaultInstallDir(env: NodeJS.ProcessEnv): string;
}

export const WINDOWS_PLATFORM: HostPlatform = {
  family: 'windows',
  downloadName: `${TOOL_NAME}.exe`,
  commandNames: [`${TOOL_NAME}.exe`],
  pathDelimiter: ';',
  wellKnownLocations: [
    'C:\\Program Files\\yt-dlp\\yt-dlp.exe',
    'C:\\yt-dlp\\yt-dlp.exe',
    `C:\\ProgramData\\${WINDOWS_APP_DIR}\\yt-dlp.exe`,
  ],
  join: (...segments) => path.win32.join(...segments),
  defaultInstallDir: getWindowsInstallDir,
};

const POSIX_LOCATIONS = [
  '/usr/local/bin/yt-dlp',
  '/usr/bin/yt-dlp',
  '/opt/homebrew/bin/yt-dlp',
];

export const MACOS_PLATFORM: HostPlatform = {
  family: 'macos',
  downloadName: `${TOOL_NAME}_macos`,
  commandNames: [TOOL_NAME, `${TOOL_NAME}_macos`],
  pathDelimiter: ':',
  wellKnownLocations: POSIX_LOCATIONS,
  join: (...segments) => path.posix.join(...segments),
  defaultInstallDir: getPosixInstallDir,
};

export const LINUX_PLATFORM: HostPlatform = {
  family: 'linux',
  downloadName: TOOL_NAME,
  commandNames: [TOOL_NAME],
  pathDelimiter: ':',
  wellKnownLocations: POSIX_LOCATIONS,
  join: (...segments) => path.posix.join(...segments),
  defaultInstallDir: getPosixInstallDir,
};

export function getHostPlatform(platform: NodeJS.Platform = process.platform): HostPlatform {
  switch (platform) {
    case 'win32':
      return WINDOWS_PLATFORM;
    case 'darwin':
      return MACOS_PLATFORM;
    default:
      return LINUX_PLATFORM;
  }
}
