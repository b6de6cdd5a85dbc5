// src/core/tool/context.ts
import { getHostPlatform, type HostPlatform } from '../config/platform.js';
import {
  mergeToolSettings,
  parseToolSettings,
  type ToolSettings,
  type ToolSettingsInput,
  type ToolSettingsPatch,
} from '../config/settings.js';
import { ErrorCode, ResolverError } from '../errors.js';
import { logger } from '../logger.js';
import { NodeToolFileSystem, type ToolFileSystem } from './filesystem.js';
import { downloadWithAxios, ToolInstaller, type BinaryDownloader, type ProgressCallback } from './installer.js';
import { ToolLocator } from './locator.js';

const log = logger.scope('Tool');

export interface ToolContextDeps {
  locator: ToolLocator;
  installer: ToolInstaller;
  fs: ToolFileSystem;
}

export interface ToolContextOptions {
  settings?: ToolSettingsInput;
  platform?: HostPlatform;
  fs?: ToolFileSystem;
  download?: BinaryDownloader;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolver configuration plus what has been learned about the yt-dlp binary:
 * its cached path and whether an automatic download was already tried.
 *
 * Configuration is single-writer: changing settings while a resolution is in
 * flight is not synchronized, so callers serialize reconfiguration themselves.
 */
export class ToolContext {
  private settings: ToolSettings;
  private cachedPath: string | null = null;
  private downloadAttempted = false;
  private pendingInstall: Promise<string> | null = null;

  constructor(private readonly deps: ToolContextDeps, settings: ToolSettingsInput = {}) {
    this.settings = parseToolSettings(settings);
  }

  static create(options: ToolContextOptions = {}): ToolContext {
    const platform = options.platform ?? getHostPlatform();
    const fs = options.fs ?? new NodeToolFileSystem(platform.family);
    const env = options.env ?? process.env;

    return new ToolContext(
      {
        fs,
        locator: new ToolLocator(platform, fs, env),
        installer: new ToolInstaller(platform, fs, options.download ?? downloadWithAxios, env),
      },
      options.settings
    );
  }

  getSettings(): Readonly<ToolSettings> {
    return { ...this.settings };
  }

  get timeoutMs(): number {
    return this.settings.timeoutMs;
  }

  configure(patch: ToolSettingsPatch): void {
    const next = mergeToolSettings(this.settings, patch);
    if (next.toolPath !== this.settings.toolPath || next.installDir !== this.settings.installDir) {
      this.cachedPath = null;
    }
    this.settings = next;
  }

  setToolPath(toolPath: string): void {
    this.configure({ toolPath });
  }

  hasAttemptedDownload(): boolean {
    return this.downloadAttempted;
  }

  /**
   * Path of a usable binary, or null. A cached path is reused while it
   * still exists on disk; otherwise the locator search runs again.
   */
  async getToolPath(): Promise<string | null> {
    if (this.cachedPath !== null && (await this.deps.fs.isFile(this.cachedPath))) {
      return this.cachedPath;
    }

    const found = await this.deps.locator.locate(this.settings);
    this.cachedPath = found?.path ?? null;
    return this.cachedPath;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.getToolPath()) !== null;
  }

  /**
   * Availability gate used before every invocation. Downloads the binary at
   * most once per context, and only when auto-download is enabled.
   */
  async acquireToolPath(): Promise<string | null> {
    const existing = await this.getToolPath();
    if (existing) return existing;

    if (this.pendingInstall) {
      return this.pendingInstall.catch(() => null);
    }

    if (!this.settings.autoDownload) {
      return null;
    }

    if (this.downloadAttempted) {
      // An install may have finished while this caller was searching
      return this.getToolPath();
    }

    try {
      return await this.install();
    } catch (error) {
      log.warn('Automatic yt-dlp download failed', error);
      return null;
    }
  }

  /**
   * Explicit request: installs when nothing is found, regardless of the
   * auto-download setting or an earlier attempt.
   */
  async ensureAvailable(onProgress?: ProgressCallback): Promise<string> {
    const existing = await this.getToolPath();
    if (existing) {
      onProgress?.(1);
      return existing;
    }

    if (this.pendingInstall) {
      const installed = await this.pendingInstall;
      onProgress?.(1);
      return installed;
    }

    return this.install(undefined, onProgress);
  }

  /**
   * Installs into targetDir, or the configured install directory, or the
   * platform default. Marks the download as attempted before it starts.
   */
  install(targetDir?: string, onProgress?: ProgressCallback): Promise<string> {
    this.downloadAttempted = true;

    const run = async (): Promise<string> => {
      try {
        const installed = await this.deps.installer.install(targetDir ?? this.settings.installDir, onProgress);
        this.cachedPath = installed;
        return installed;
      } finally {
        this.pendingInstall = null;
      }
    };

    this.pendingInstall = run();
    return this.pendingInstall;
  }

  /** Path of a usable binary or a TOOL_NOT_FOUND error */
  async requireToolPath(): Promise<string> {
    const toolPath = await this.acquireToolPath();
    if (!toolPath) {
      throw new ResolverError(
        ErrorCode.TOOL_NOT_FOUND,
        'yt-dlp is not available',
        false,
        this.settings.autoDownload
          ? 'Install yt-dlp or run `media-resolver install`'
          : 'Install yt-dlp, set a tool path, or enable auto-download'
      );
    }
    return toolPath;
  }
}

let defaultContext: ToolContext | null = null;

/** Process-wide context, created on first use */
export function getDefaultToolContext(): ToolContext {
  if (!defaultContext) {
    defaultContext = ToolContext.create();
  }
  return defaultContext;
}
