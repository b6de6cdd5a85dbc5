// src/core/tool/locator.ts
import type { HostPlatform } from '../config/platform.js';
import type { ToolSettings } from '../config/settings.js';
import { logger } from '../logger.js';
import type { ToolFileSystem } from './filesystem.js';

const log = logger.scope('Locator');

export type ToolSource = 'configured' | 'install-dir' | 'default-dir' | 'system' | 'path';

export interface ToolCandidate {
  path: string;
  source: ToolSource;
}

export class ToolLocator {
  constructor(
    private readonly platform: HostPlatform,
    private readonly fs: ToolFileSystem,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Candidate paths in search order. Earlier entries win.
   */
  candidates(settings: Pick<ToolSettings, 'toolPath' | 'installDir'>): ToolCandidate[] {
    const { platform } = this;
    const list: ToolCandidate[] = [];

    if (settings.toolPath) {
      list.push({ path: settings.toolPath, source: 'configured' });
    }

    if (settings.installDir) {
      list.push({ path: platform.join(settings.installDir, platform.downloadName), source: 'install-dir' });
    }

    list.push({
      path: platform.join(platform.defaultInstallDir(this.env), platform.downloadName),
      source: 'default-dir',
    });

    for (const location of platform.wellKnownLocations) {
      list.push({ path: location, source: 'system' });
    }

    const searchPath = this.env.PATH ?? this.env.Path ?? '';
    for (const dir of searchPath.split(platform.pathDelimiter)) {
      if (!dir) continue;
      for (const name of platform.commandNames) {
        list.push({ path: platform.join(dir, name), source: 'path' });
      }
    }

    return list;
  }

  async locate(settings: Pick<ToolSettings, 'toolPath' | 'installDir'>): Promise<ToolCandidate | null> {
    for (const candidate of this.candidates(settings)) {
      if (await this.fs.isFile(candidate.path)) {
        log.debug(`Found yt-dlp (${candidate.source}): ${candidate.path}`);
        return candidate;
      }
    }

    log.debug('yt-dlp not found in any search location');
    return null;
  }
}
