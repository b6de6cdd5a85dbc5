// src/cli/options.ts
import { Command, InvalidArgumentError } from 'commander';
import { loadSettingsFromEnv, mergeToolSettings, type ToolSettingsPatch } from '../core/config/settings.js';
import { MAX_TIMEOUT } from '../core/config/constants.js';
import { toErrorInfo } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { ytdlpResolverFactory } from '../core/resolver/factory.js';
import { parseQuality, type StreamQuality } from '../core/resolver/quality.js';
import { ToolContext } from '../core/tool/context.js';
import type { MediaResolver } from '../core/types/index.js';

/** Options shared by every command that runs yt-dlp */
export interface ToolOptions {
  toolPath?: string;
  installDir?: string;
  /** false only when --no-auto-download was given */
  autoDownload?: boolean;
  timeout?: number;
  verbose?: boolean;
}

export interface CliDeps {
  createResolver(options: ToolOptions): MediaResolver;
}

export function parseQualityOption(value: string): StreamQuality {
  try {
    return parseQuality(value);
  } catch (error) {
    throw new InvalidArgumentError(toErrorInfo(error).message);
  }
}

export function parseTimeoutOption(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_TIMEOUT) {
    throw new InvalidArgumentError(`Timeout must be between 1 and ${MAX_TIMEOUT} milliseconds`);
  }
  return timeout;
}

export function addToolOptions(command: Command): Command {
  return command
    .option('--tool-path <path>', 'Use this yt-dlp binary')
    .option('--install-dir <dir>', 'Directory for a downloaded yt-dlp')
    .option('--no-auto-download', 'Never download yt-dlp automatically')
    .option('--timeout <ms>', 'Timeout for each yt-dlp invocation', parseTimeoutOption)
    .option('--verbose', 'Verbose output', false);
}

/**
 * Settings come from MEDIA_RESOLVER_* variables; command-line flags
 * override them.
 */
export function createToolContext(options: ToolOptions, env: NodeJS.ProcessEnv = process.env): ToolContext {
  const overrides: ToolSettingsPatch = {};
  if (options.toolPath) overrides.toolPath = options.toolPath;
  if (options.installDir) overrides.installDir = options.installDir;
  if (options.autoDownload === false) overrides.autoDownload = false;
  if (options.timeout !== undefined) overrides.timeoutMs = options.timeout;

  return ToolContext.create({
    settings: mergeToolSettings(loadSettingsFromEnv(env), overrides),
    env,
  });
}

export function createResolver(options: ToolOptions): MediaResolver {
  if (options.verbose) {
    logger.setLevel('debug');
  }
  return ytdlpResolverFactory.create(createToolContext(options));
}

export const defaultDeps: CliDeps = { createResolver };

/** Prints a failure and marks the process as failed without exiting mid-output */
export function reportFailure(error: unknown): void {
  const info = toErrorInfo(error);
  console.error(`✗ ${info.message}`);
  if (info.suggestion) {
    console.error(`  ${info.suggestion}`);
  }
  process.exitCode = 1;
}
