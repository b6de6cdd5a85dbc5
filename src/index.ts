// src/index.ts
export { ErrorCode, ResolverError, toErrorInfo, type ErrorInfo } from './core/errors.js';
export { logger, type LogLevel, type LogSink } from './core/logger.js';
export {
  loadSettingsFromEnv,
  parseToolSettings,
  type ToolSettings,
  type ToolSettingsInput,
  type ToolSettingsPatch,
} from './core/config/settings.js';
export { getHostPlatform, type HostPlatform, type PlatformFamily } from './core/config/platform.js';
export { ChildProcessRunner, processRunner, type ProcessResult, type ProcessRunner } from './core/process/runner.js';
export { buildFormatArgument, selectFormats, type FormatSpec } from './core/format/selector.js';
export { ToolLocator, type ToolCandidate, type ToolSource } from './core/tool/locator.js';
export { ToolInstaller, downloadWithAxios, type BinaryDownloader } from './core/tool/installer.js';
export { NodeToolFileSystem, type ToolFileSystem } from './core/tool/filesystem.js';
export { ToolContext, getDefaultToolContext, type ToolContextOptions } from './core/tool/context.js';
export { SUPPORTED_HOSTS, canHandleUrl, extractHost, isSupportedHost } from './core/resolver/hosts.js';
export { QUALITY_HEIGHTS, parseQuality, qualityToHeight } from './core/resolver/quality.js';
export { RESOLVER_INFO, RESOLVER_VERSION } from './core/resolver/info.js';
export { StreamResolver } from './core/resolver/stream-resolver.js';
export { ytdlpResolverFactory, type ResolverFactory } from './core/resolver/factory.js';
export { BatchRunner, type BatchOptions, type BatchSummary } from './core/batch/runner.js';
export type {
  MediaResolver,
  OperationResult,
  ProbeOptions,
  ProbeResult,
  ProgressCallback,
  QualityTier,
  ResolvedStream,
  ResolvedStreamFailure,
  ResolvedStreamSuccess,
  ResolveOptions,
  ResolverCapabilities,
  ResolverInfo,
  StreamQuality,
} from './core/types/index.js';
