// src/core/resolver/stream-resolver.ts
import { MAX_TIMEOUT } from '../config/constants.js';
import { ErrorCode, ResolverError, toErrorInfo } from '../errors.js';
import { buildFormatArgument, selectFormats } from '../format/selector.js';
import { logger } from '../logger.js';
import { isSuccessful, processRunner, type ProcessResult, type ProcessRunner } from '../process/runner.js';
import { getDefaultToolContext, type ToolContext } from '../tool/context.js';
import type { ProgressCallback } from '../tool/installer.js';
import type {
  MediaResolver,
  OperationResult,
  ProbeOptions,
  ProbeResult,
  ResolvedStream,
  ResolvedStreamFailure,
  ResolvedStreamSuccess,
  ResolveOptions,
  ResolverInfo,
} from '../types/index.js';
import {
  directUrlArgs,
  liveCheckArgs,
  metadataArgs,
  probeArgs,
  UPDATE_ARGS,
  VERSION_ARGS,
} from './commands.js';
import { canHandleUrl } from './hosts.js';
import { RESOLVER_INFO } from './info.js';
import { isHlsUrl, parseBooleanFlag, parseDirectUrls, parseMetadata, parseProbe } from './parser.js';
import { qualityToHeight, type StreamQuality } from './quality.js';

const log = logger.scope('Resolver');

/**
 * Maps a failed invocation to the error it stands for. Only a clean run that
 * exited non-zero carries the tool's own message.
 */
export function processFailure(result: ProcessResult, timeoutMs: number, fallbackMessage: string): ResolverError {
  if (result.timedOut) {
    return new ResolverError(
      ErrorCode.PROCESS_TIMEOUT,
      `yt-dlp timed out after ${timeoutMs}ms`,
      true,
      'Increase the timeout or try again later'
    );
  }

  if (result.spawnError !== undefined) {
    return new ResolverError(ErrorCode.PROCESS_SPAWN_FAILED, result.spawnError, false, 'Check the yt-dlp path and its permissions');
  }

  const message = result.stderr.trim() || fallbackMessage;
  return new ResolverError(ErrorCode.RESOLUTION_FAILED, message, false, undefined, {
    exitCode: result.exitCode,
  });
}

export class StreamResolver implements MediaResolver {
  readonly info: ResolverInfo = RESOLVER_INFO;
  private destroyed = false;

  constructor(
    private readonly context: ToolContext = getDefaultToolContext(),
    private readonly runner: ProcessRunner = processRunner
  ) {}

  canHandle(url: string): boolean {
    return canHandleUrl(url, this.info.hosts);
  }

  async resolve(url: string, options: ResolveOptions = {}): Promise<ResolvedStream> {
    const quality: StreamQuality = options.quality ?? 'auto';
    let isLive = false;

    try {
      this.assertUsable(url);
      const timeoutMs = this.invocationTimeout(options.timeoutMs);
      const toolPath = await this.context.requireToolPath();

      const liveCheck = await this.runner.run(toolPath, liveCheckArgs(url), timeoutMs);
      isLive = isSuccessful(liveCheck) && parseBooleanFlag(liveCheck.stdout);
      log.debug(`${url}: ${isLive ? 'live' : 'not live'}`);

      const height = qualityToHeight(quality);
      const formatArgument = buildFormatArgument(selectFormats(height, isLive));
      log.debug(`${url}: format ${formatArgument}`);

      const urlResult = await this.runner.run(toolPath, directUrlArgs(url, formatArgument), timeoutMs);
      const urls = isSuccessful(urlResult) ? parseDirectUrls(urlResult.stdout) : null;
      if (!urls) {
        throw processFailure(urlResult, timeoutMs, 'Failed to resolve URL');
      }

      const stream: ResolvedStreamSuccess = {
        success: true,
        originalUrl: url,
        quality,
        directUrl: urls.directUrl,
        isLive,
        isHls: isHlsUrl(urls.directUrl),
        width: 0,
        height: 0,
      };
      if (urls.audioUrl) {
        stream.audioUrl = urls.audioUrl;
      }

      if (options.includeMetadata !== false) {
        // A direct URL is already in hand; metadata is best-effort
        const info = await this.runner.run(toolPath, metadataArgs(url), timeoutMs);
        if (isSuccessful(info)) {
          const metadata = parseMetadata(info.stdout);
          if (metadata.title !== undefined) stream.title = metadata.title;
          stream.width = metadata.width;
          stream.height = metadata.height;
        } else {
          log.debug(`${url}: metadata unavailable`);
        }
      }

      log.info(`Resolved ${url}${stream.isHls ? ' (HLS)' : ''}`);
      return stream;
    } catch (error) {
      const failure = this.failedStream(url, quality, isLive, error);
      log.warn(`Failed to resolve ${url}: ${failure.error}`);
      return failure;
    }
  }

  async probe(url: string, options: ProbeOptions = {}): Promise<ProbeResult> {
    try {
      this.assertUsable(url);
      const timeoutMs = this.invocationTimeout(options.timeoutMs);
      const toolPath = await this.context.requireToolPath();

      const result = await this.runner.run(toolPath, probeArgs(url), timeoutMs);
      if (!isSuccessful(result)) {
        throw processFailure(result, timeoutMs, 'Failed to probe URL');
      }

      const fields = parseProbe(result.stdout);
      const probe: ProbeResult = { success: true, originalUrl: url, isLive: fields.isLive };
      if (fields.title !== undefined) probe.title = fields.title;
      if (fields.duration !== undefined) probe.duration = fields.duration;
      return probe;
    } catch (error) {
      const info = toErrorInfo(error);
      return { success: false, originalUrl: url, isLive: false, error: info.message, errorCode: info.code };
    }
  }

  async ensureAvailable(onProgress?: ProgressCallback): Promise<OperationResult> {
    try {
      const toolPath = await this.context.ensureAvailable(onProgress);
      return { success: true, path: toolPath };
    } catch (error) {
      return this.failedOperation(error);
    }
  }

  async updateTool(onProgress?: ProgressCallback): Promise<OperationResult> {
    try {
      const toolPath = await this.context.requireToolPath();
      onProgress?.(0);

      const timeoutMs = this.context.timeoutMs;
      const result = await this.runner.run(toolPath, UPDATE_ARGS, timeoutMs);
      if (!isSuccessful(result)) {
        throw processFailure(result, timeoutMs, 'yt-dlp self-update failed');
      }

      onProgress?.(1);
      log.info(result.stdout.trim() || 'yt-dlp updated');
      return { success: true, path: toolPath };
    } catch (error) {
      return this.failedOperation(error);
    }
  }

  async getToolVersion(): Promise<string | null> {
    const toolPath = await this.context.acquireToolPath();
    if (!toolPath) return null;

    const result = await this.runner.run(toolPath, VERSION_ARGS, this.context.timeoutMs);
    if (!isSuccessful(result)) {
      log.warn(`Could not read yt-dlp version: ${processFailure(result, this.context.timeoutMs, 'no output').message}`);
      return null;
    }

    return result.stdout.trim() || null;
  }

  setToolPath(toolPath: string): void {
    this.context.setToolPath(toolPath);
  }

  /** Later resolve/probe calls on this instance fail with INVALID_PARAM */
  destroy(): void {
    this.destroyed = true;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  private assertUsable(url: string): void {
    if (this.destroyed) {
      throw new ResolverError(ErrorCode.INVALID_PARAM, 'Resolver has been destroyed');
    }
    if (typeof url !== 'string' || url.trim() === '') {
      throw new ResolverError(ErrorCode.INVALID_PARAM, 'URL must be a non-empty string');
    }
  }

  private invocationTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined) return this.context.timeoutMs;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT) {
      throw new ResolverError(
        ErrorCode.INVALID_PARAM,
        `Invalid timeout: ${timeoutMs}`,
        false,
        `Use a whole number of milliseconds between 1 and ${MAX_TIMEOUT}`
      );
    }
    return timeoutMs;
  }

  private failedStream(url: string, quality: StreamQuality, isLive: boolean, error: unknown): ResolvedStreamFailure {
    const info = toErrorInfo(error);
    return {
      success: false,
      originalUrl: url,
      quality,
      directUrl: '',
      error: info.message,
      errorCode: info.code,
      isLive,
      isHls: false,
      width: 0,
      height: 0,
    };
  }

  private failedOperation(error: unknown): OperationResult {
    const info = toErrorInfo(error);
    return { success: false, error: info.message, errorCode: info.code };
  }
}
