// src/core/config/settings.ts
import { z } from 'zod';
import { ErrorCode, ResolverError } from '../errors.js';
import { DEFAULT_TIMEOUT, MAX_TIMEOUT } from './constants.js';

export const ToolSettingsSchema = z.object({
  toolPath: z.string().min(1).optional(),
  installDir: z.string().min(1).optional(),
  autoDownload: z.boolean().default(true),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT).default(DEFAULT_TIMEOUT),
});

export type ToolSettings = z.infer<typeof ToolSettingsSchema>;
export type ToolSettingsInput = z.input<typeof ToolSettingsSchema>;

// Unset fields keep their current value when merged into existing settings
export const ToolSettingsPatchSchema = z.object({
  toolPath: z.string().min(1).optional(),
  installDir: z.string().min(1).optional(),
  autoDownload: z.boolean().optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT).optional(),
});

export type ToolSettingsPatch = z.infer<typeof ToolSettingsPatchSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
    .join('; ');
}

export function parseToolSettings(input: unknown = {}): ToolSettings {
  const result = ToolSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ResolverError(
      ErrorCode.INVALID_PARAM,
      `Invalid resolver settings: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

export function mergeToolSettings(current: ToolSettings, patch: unknown): ToolSettings {
  const result = ToolSettingsPatchSchema.safeParse(patch);
  if (!result.success) {
    throw new ResolverError(
      ErrorCode.INVALID_PARAM,
      `Invalid resolver settings: ${describeIssues(result.error)}`
    );
  }

  const next: ToolSettings = { ...current };
  const { toolPath, installDir, autoDownload, timeoutMs } = result.data;
  if (toolPath !== undefined) next.toolPath = toolPath;
  if (installDir !== undefined) next.installDir = installDir;
  if (autoDownload !== undefined) next.autoDownload = autoDownload;
  if (timeoutMs !== undefined) next.timeoutMs = timeoutMs;
  return next;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value.trim());
}

/**
 * Reads MEDIA_RESOLVER_* variables. Unset variables fall back to the schema
 * defaults; malformed ones are rejected.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ToolSettings {
  return parseToolSettings({
    toolPath: env.MEDIA_RESOLVER_TOOL_PATH || undefined,
    installDir: env.MEDIA_RESOLVER_INSTALL_DIR || undefined,
    autoDownload: parseFlag(env.MEDIA_RESOLVER_AUTO_DOWNLOAD),
    timeoutMs: parseInteger(env.MEDIA_RESOLVER_TIMEOUT_MS),
  });
}
