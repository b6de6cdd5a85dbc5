// src/cli/__tests__/integration.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ErrorCode, ResolverError } from '../../core/errors.js';
import { RESOLVER_INFO } from '../../core/resolver/info.js';
import type { MediaResolver } from '../../core/types/index.js';
import { buildProgram, runCli } from '../index.js';
import type { CliDeps } from '../options.js';

const PAGE = 'https://www.youtube.com/watch?v=abc123';

function createFakeResolver() {
  return {
    info: RESOLVER_INFO,
    canHandle: jest.fn<MediaResolver['canHandle']>(() => true),
    resolve: jest.fn<MediaResolver['resolve']>(async (url) => ({
      success: true,
      originalUrl: url,
      quality: 'auto',
      directUrl: 'https://cdn.example/video.mp4',
      isLive: false,
      isHls: false,
      width: 1280,
      height: 720,
    })),
    probe: jest.fn<MediaResolver['probe']>(async (url) => ({
      success: true,
      originalUrl: url,
      title: 'Clip',
      isLive: false,
      duration: 3725,
    })),
    ensureAvailable: jest.fn<MediaResolver['ensureAvailable']>(async () => ({ success: true, path: '/usr/bin/yt-dlp' })),
    updateTool: jest.fn<MediaResolver['updateTool']>(async () => ({ success: true, path: '/usr/bin/yt-dlp' })),
    getToolVersion: jest.fn<MediaResolver['getToolVersion']>(async () => '2024.08.06'),
    setToolPath: jest.fn<MediaResolver['setToolPath']>(),
  } satisfies MediaResolver;
}

function findCommand(program: Command, name: string): Command {
  const command = program.commands.find((cmd) => cmd.name() === name);
  if (!command) {
    throw new Error(`command ${name} is not registered`);
  }
  return command;
}

describe('CLI Integration Tests', () => {
  let resolver: ReturnType<typeof createFakeResolver>;
  let createResolver: jest.Mock<CliDeps['createResolver']>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  const run = (...args: string[]) => buildProgram({ createResolver }).parseAsync(['node', 'media-resolver', ...args]);

  beforeEach(() => {
    resolver = createFakeResolver();
    createResolver = jest.fn<CliDeps['createResolver']>(() => resolver);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('registers every command', () => {
    const names = buildProgram({ createResolver }).commands.map((cmd) => cmd.name());

    expect(names).toEqual(['resolve', 'probe', 'install', 'update', 'tool-version', 'hosts']);
  });

  it('should show help for the resolve command', () => {
    const help = findCommand(buildProgram({ createResolver }), 'resolve').helpInformation();

    expect(help).toContain('[url]');
    expect(help).toContain('--file');
    expect(help).toContain('--stdin');
    expect(help).toContain('--quality');
    expect(help).toContain('--no-auto-download');
  });

  it('runs parseAsync via runCli with provided argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'media-resolver', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'media-resolver', '--help']);
  });

  describe('resolve', () => {
    it('should error when no URL or file provided', async () => {
      await run('resolve');

      expect(errorSpy).toHaveBeenCalledWith('Error: URL argument or --file/--stdin is required');
      expect(process.exitCode).toBe(1);
      expect(createResolver).not.toHaveBeenCalled();
    });

    it('prints the direct URL', async () => {
      await run('resolve', PAGE, '--quality', '720p', '--timeout', '5000', '--no-metadata');

      expect(resolver.resolve).toHaveBeenCalledWith(PAGE, { quality: '720p', timeoutMs: 5000, includeMetadata: false });
      expect(logSpy).toHaveBeenCalledWith('https://cdn.example/video.mp4');
      expect(process.exitCode).toBeUndefined();
    });

    it('passes tool options to the resolver factory', async () => {
      await run('resolve', PAGE, '--tool-path', '/opt/yt-dlp', '--no-auto-download');

      expect(createResolver).toHaveBeenCalledWith(
        expect.objectContaining({ toolPath: '/opt/yt-dlp', autoDownload: false, quality: 'auto', metadata: true })
      );
    });

    it('prints the audio URL of a separate pair on its own line', async () => {
      resolver.resolve.mockResolvedValue({
        success: true,
        originalUrl: PAGE,
        quality: 'auto',
        directUrl: 'https://cdn.example/video.mp4',
        audioUrl: 'https://cdn.example/audio.m4a',
        isLive: false,
        isHls: false,
        width: 0,
        height: 0,
      });

      await run('resolve', PAGE);

      expect(logSpy.mock.calls).toEqual([['https://cdn.example/video.mp4'], ['https://cdn.example/audio.m4a']]);
    });

    it('should output json when --json is set', async () => {
      await run('resolve', PAGE, '--json');

      expect(logSpy).toHaveBeenCalledTimes(1);
      const printed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(printed).toMatchObject({ success: true, directUrl: 'https://cdn.example/video.mp4' });
    });

    it('reports a failed resolution', async () => {
      resolver.resolve.mockResolvedValue({
        success: false,
        originalUrl: PAGE,
        quality: 'auto',
        directUrl: '',
        error: 'ERROR: Unsupported URL',
        errorCode: ErrorCode.RESOLUTION_FAILED,
        isLive: false,
        isHls: false,
        width: 0,
        height: 0,
      });

      await run('resolve', PAGE);

      expect(errorSpy).toHaveBeenCalledWith('✗ ERROR: Unsupported URL (resolution_failed)');
      expect(process.exitCode).toBe(1);
    });

    it('reports configuration errors', async () => {
      createResolver.mockImplementation(() => {
        throw new ResolverError(ErrorCode.INVALID_PARAM, 'Invalid resolver settings: timeoutMs: bad', false, 'Fix MEDIA_RESOLVER_TIMEOUT_MS');
      });

      await run('resolve', PAGE);

      expect(errorSpy.mock.calls).toEqual([
        ['✗ Invalid resolver settings: timeoutMs: bad'],
        ['  Fix MEDIA_RESOLVER_TIMEOUT_MS'],
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('rejects an invalid quality', async () => {
      const program = buildProgram({ createResolver });
      findCommand(program, 'resolve')
        .exitOverride()
        .configureOutput({ writeErr: () => undefined });

      await expect(program.parseAsync(['node', 'media-resolver', 'resolve', PAGE, '--quality', 'best'])).rejects.toThrow(
        'Invalid quality: best'
      );
      expect(resolver.resolve).not.toHaveBeenCalled();
    });

    describe('batch mode', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'media-resolver-cli-'));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('should run batch mode when --file is provided', async () => {
        const file = path.join(dir, 'urls.txt');
        await writeFile(file, `${PAGE}\nhttps://vimeo.com/1\n`, 'utf-8');

        await run('resolve', '--file', file, '--continue-on-error');

        expect(resolver.resolve).toHaveBeenCalledTimes(2);
        expect(logSpy).toHaveBeenCalledWith(`✓ ${PAGE}`);
        expect(logSpy).toHaveBeenCalledWith('✓ https://vimeo.com/1');
        expect(process.exitCode).toBeUndefined();
      });

      it('fails the process when a URL fails', async () => {
        const file = path.join(dir, 'urls.txt');
        await writeFile(file, `${PAGE}\n`, 'utf-8');
        resolver.resolve.mockResolvedValue({
          success: false,
          originalUrl: PAGE,
          quality: 'auto',
          directUrl: '',
          error: 'ERROR: gone',
          errorCode: ErrorCode.RESOLUTION_FAILED,
          isLive: false,
          isHls: false,
          width: 0,
          height: 0,
        });

        await run('resolve', '--file', file);

        expect(logSpy).toHaveBeenCalledWith(`✗ ${PAGE} (resolution_failed)`);
        expect(process.exitCode).toBe(1);
      });

      it('reports a missing file', async () => {
        await run('resolve', '--file', path.join(dir, 'missing.txt'));

        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('✗ ENOENT'));
        expect(process.exitCode).toBe(1);
      });
    });
  });

  describe('probe', () => {
    it('prints title, live flag and duration', async () => {
      await run('probe', PAGE);

      expect(resolver.probe).toHaveBeenCalledWith(PAGE, { timeoutMs: undefined });
      expect(logSpy.mock.calls).toEqual([
        ['Title:', 'Clip'],
        ['Live:', 'no'],
        ['Duration:', '1:02:05'],
      ]);
    });

    it('reports a failed probe', async () => {
      resolver.probe.mockResolvedValue({
        success: false,
        originalUrl: PAGE,
        isLive: false,
        error: 'ERROR: Private video',
        errorCode: ErrorCode.RESOLUTION_FAILED,
      });

      await run('probe', PAGE);

      expect(errorSpy).toHaveBeenCalledWith('✗ ERROR: Private video (resolution_failed)');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('tool management', () => {
    it('installs yt-dlp', async () => {
      await run('install', '--install-dir', '/srv/tools');

      expect(createResolver).toHaveBeenCalledWith(expect.objectContaining({ installDir: '/srv/tools' }));
      expect(resolver.ensureAvailable).toHaveBeenCalledWith(expect.any(Function));
      expect(logSpy).toHaveBeenCalledWith('✓ yt-dlp available at /usr/bin/yt-dlp');
    });

    it('reports a failed install', async () => {
      resolver.ensureAvailable.mockResolvedValue({
        success: false,
        error: 'Failed to install yt-dlp: offline',
        errorCode: ErrorCode.DOWNLOAD_FAILED,
      });

      await run('install');

      expect(errorSpy).toHaveBeenCalledWith('✗ Failed to install yt-dlp: offline (download_failed)');
      expect(process.exitCode).toBe(1);
    });

    it('updates yt-dlp and prints the new version', async () => {
      await run('update');

      expect(resolver.updateTool).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith('✓ yt-dlp is up to date (2024.08.06)');
    });

    it('prints the tool version', async () => {
      await run('tool-version');

      expect(logSpy).toHaveBeenCalledWith('2024.08.06');
    });

    it('fails when no version can be read', async () => {
      resolver.getToolVersion.mockResolvedValue(null);

      await run('tool-version');

      expect(errorSpy).toHaveBeenCalledWith('✗ yt-dlp is not available');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('hosts', () => {
    it('lists every supported host', async () => {
      await run('hosts');

      expect(logSpy).toHaveBeenCalledTimes(RESOLVER_INFO.hosts.length);
      expect(logSpy).toHaveBeenCalledWith('youtube.com');
    });

    it('checks a single URL', async () => {
      await run('hosts', 'https://example.org/video');

      expect(logSpy).toHaveBeenCalledWith('⊘ https://example.org/video (unsupported host)');
      expect(process.exitCode).toBe(1);
    });
  });
});
