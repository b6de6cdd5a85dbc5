// src/core/tool/__tests__/installer.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { LINUX_PLATFORM, MACOS_PLATFORM, WINDOWS_PLATFORM } from '../../config/platform.js';
import { ErrorCode, ResolverError } from '../../errors.js';
import { ToolInstaller, type BinaryDownloader } from '../installer.js';
import { MemoryFileSystem } from './memory-fs.js';

const env = { HOME: '/home/u' };

function writingDownloader(fs: MemoryFileSystem, size: number): BinaryDownloader {
  return async (_url, destination, onProgress) => {
    onProgress?.(0.5);
    fs.write(destination, size);
  };
}

describe('ToolInstaller', () => {
  it.each([
    [WINDOWS_PLATFORM, 'https://github.com/yt-dlp/yt-dlp/releases/latest/download/yt-dlp.exe'],
    [MACOS_PLATFORM, 'https://github.com/yt-dlp/yt-dlp/releases/latest/download/yt-dlp_macos'],
    [LINUX_PLATFORM, 'https://github.com/yt-dlp/yt-dlp/releases/latest/download/yt-dlp'],
  ])('builds the release URL for %#', (platform, expected) => {
    expect(new ToolInstaller(platform, new MemoryFileSystem()).getDownloadUrl()).toBe(expected);
  });

  it('installs into the default directory', async () => {
    const fs = new MemoryFileSystem();
    const download = jest.fn(writingDownloader(fs, 2048));
    const installer = new ToolInstaller(LINUX_PLATFORM, fs, download, env);
    const progress: number[] = [];

    const installed = await installer.install(undefined, (p) => progress.push(p));

    expect(installed).toBe('/home/u/.local/bin/yt-dlp');
    expect(download).toHaveBeenCalledWith(
      'https://github.com/yt-dlp/yt-dlp/releases/latest/download/yt-dlp',
      '/home/u/.local/bin/yt-dlp.part',
      expect.any(Function)
    );
    expect(fs.dirs.has('/home/u/.local/bin')).toBe(true);
    expect(fs.files.get('/home/u/.local/bin/yt-dlp')).toBe(2048);
    expect(fs.files.has('/home/u/.local/bin/yt-dlp.part')).toBe(false);
    expect(fs.executables.has('/home/u/.local/bin/yt-dlp')).toBe(true);
    expect(progress).toEqual([0, 0.5, 1]);
  });

  it('installs into an explicit directory', async () => {
    const fs = new MemoryFileSystem();
    const installer = new ToolInstaller(LINUX_PLATFORM, fs, writingDownloader(fs, 1), env);

    expect(await installer.install('/srv/tools')).toBe('/srv/tools/yt-dlp');
  });

  it('fails with DOWNLOAD_FAILED and removes the partial file when the download fails', async () => {
    const fs = new MemoryFileSystem();
    const download: BinaryDownloader = async (_url, destination) => {
      fs.write(destination, 100);
      throw new Error('socket hang up');
    };
    const installer = new ToolInstaller(LINUX_PLATFORM, fs, download, env);

    const error = await installer.install().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolverError);
    if (error instanceof ResolverError) {
      expect(error.code).toBe(ErrorCode.DOWNLOAD_FAILED);
      expect(error.message).toBe('Failed to install yt-dlp: socket hang up');
      expect(error.retryable).toBe(true);
    }
    expect(fs.files.size).toBe(0);
  });

  it('rejects an empty download', async () => {
    const fs = new MemoryFileSystem();
    const installer = new ToolInstaller(LINUX_PLATFORM, fs, writingDownloader(fs, 0), env);

    await expect(installer.install()).rejects.toThrow('Failed to install yt-dlp: downloaded file is missing or empty');
    expect(fs.files.has('/home/u/.local/bin/yt-dlp')).toBe(false);
  });
});
