// src/core/tool/installer.ts
import axios from 'axios';
import { createWriteStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DOWNLOAD_TIMEOUT, RELEASE_BASE_URL } from '../config/constants.js';
import type { HostPlatform } from '../config/platform.js';
import { ErrorCode, ResolverError } from '../errors.js';
import { logger } from '../logger.js';
import type { ToolFileSystem } from './filesystem.js';

const log = logger.scope('Installer');

/** Receives values from 0 to 1 */
export type ProgressCallback = (progress: number) => void;

export type BinaryDownloader = (
  url: string,
  destination: string,
  onProgress?: ProgressCallback
) => Promise<void>;

export const downloadWithAxios: BinaryDownloader = async (url, destination, onProgress) => {
  const response = await axios.get<Readable>(url, {
    responseType: 'stream',
    timeout: DOWNLOAD_TIMEOUT,
    maxRedirects: 10,
    onDownloadProgress: (event) => {
      if (onProgress && event.total) {
        onProgress(Math.min(event.loaded / event.total, 1));
      }
    },
  });

  await pipeline(response.data, createWriteStream(destination));
};

export class ToolInstaller {
  constructor(
    private readonly platform: HostPlatform,
    private readonly fs: ToolFileSystem,
    private readonly download: BinaryDownloader = downloadWithAxios,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  getDownloadUrl(): string {
    return `${RELEASE_BASE_URL}${this.platform.downloadName}`;
  }

  getTargetPath(targetDir?: string): string {
    const dir = targetDir || this.platform.defaultInstallDir(this.env);
    return this.platform.join(dir, this.platform.downloadName);
  }

  /**
   * Downloads the release binary into targetDir (or the platform default)
   * and returns the installed path.
   */
  async install(targetDir?: string, onProgress?: ProgressCallback): Promise<string> {
    const dir = targetDir || this.platform.defaultInstallDir(this.env);
    const targetPath = this.getTargetPath(dir);
    const partialPath = `${targetPath}.part`;
    const url = this.getDownloadUrl();

    onProgress?.(0);
    log.info(`Downloading ${url} -> ${targetPath}`);

    try {
      await this.fs.ensureDir(dir);
      await this.download(url, partialPath, onProgress);

      const size = await this.fs.fileSize(partialPath);
      if (!size) {
        throw new Error('downloaded file is missing or empty');
      }

      await this.fs.rename(partialPath, targetPath);
      await this.fs.makeExecutable(targetPath);
    } catch (error) {
      await this.fs.remove(partialPath).catch((cleanupError: unknown) => {
        log.warn(`Could not remove ${partialPath}`, cleanupError);
      });

      const reason = error instanceof Error ? error.message : String(error);
      throw new ResolverError(
        ErrorCode.DOWNLOAD_FAILED,
        `Failed to install yt-dlp: ${reason}`,
        true,
        `Check your network connection or install yt-dlp manually into ${dir}`,
        { url, targetPath }
      );
    }

    onProgress?.(1);
    log.info(`Installed yt-dlp at ${targetPath}`);
    return targetPath;
  }
}
