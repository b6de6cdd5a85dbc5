import type { ErrorCode } from '../errors.js';
import type { StreamQuality } from '../resolver/quality.js';
import type { ProgressCallback } from '../tool/installer.js';

export type { StreamQuality, QualityTier } from '../resolver/quality.js';
export type { ProgressCallback } from '../tool/installer.js';

interface StreamBase {
  originalUrl: string;
  /** Quality as requested by the caller */
  quality: StreamQuality;
  isLive: boolean;
  isHls: boolean;
  title?: string;
  width: number;
  height: number;
}

export interface ResolvedStreamSuccess extends StreamBase {
  success: true;
  directUrl: string;
  /** Separate audio track when the chosen format is a video+audio pair */
  audioUrl?: string;
}

export interface ResolvedStreamFailure extends StreamBase {
  success: false;
  directUrl: '';
  error: string;
  errorCode: ErrorCode;
}

export type ResolvedStream = ResolvedStreamSuccess | ResolvedStreamFailure;

export interface ProbeResult {
  success: boolean;
  originalUrl: string;
  title?: string;
  isLive: boolean;
  /** Seconds; absent for live streams and unknown durations */
  duration?: number;
  error?: string;
  errorCode?: ErrorCode;
}

export type OperationResult =
  | { success: true; path?: string }
  | { success: false; error: string; errorCode: ErrorCode };

export interface ResolveOptions {
  quality?: StreamQuality;
  /** Per-invocation timeout; defaults to the context setting */
  timeoutMs?: number;
  /** Skip the title/width/height lookup when false */
  includeMetadata?: boolean;
}

export interface ProbeOptions {
  timeoutMs?: number;
}

export interface ResolverCapabilities {
  vod: boolean;
  live: boolean;
  qualitySelection: boolean;
  customHeaders: boolean;
  selfDownload: boolean;
  selfUpdate: boolean;
}

export interface ResolverInfo {
  id: string;
  name: string;
  version: string;
  description: string;
  capabilities: ResolverCapabilities;
  hosts: readonly string[];
}

export interface MediaResolver {
  readonly info: ResolverInfo;

  canHandle(url: string): boolean;
  resolve(url: string, options?: ResolveOptions): Promise<ResolvedStream>;
  probe(url: string, options?: ProbeOptions): Promise<ProbeResult>;
  ensureAvailable(onProgress?: ProgressCallback): Promise<OperationResult>;
  updateTool(onProgress?: ProgressCallback): Promise<OperationResult>;
  getToolVersion(): Promise<string | null>;
  setToolPath(toolPath: string): void;
}
