// src/core/resolver/commands.ts
import { BASE_TOOL_ARGS } from '../config/constants.js';

// Argument lists for each yt-dlp invocation. The URL is always last.

export function liveCheckArgs(url: string): string[] {
  return [...BASE_TOOL_ARGS, '--print', 'is_live', url];
}

export function directUrlArgs(url: string, formatArgument: string): string[] {
  return [...BASE_TOOL_ARGS, '-f', formatArgument, '--get-url', url];
}

export function metadataArgs(url: string): string[] {
  return [...BASE_TOOL_ARGS, '--print', 'title', '--print', 'width', '--print', 'height', url];
}

export function probeArgs(url: string): string[] {
  return [...BASE_TOOL_ARGS, '--print', 'title', '--print', 'is_live', '--print', 'duration', url];
}

export const VERSION_ARGS: readonly string[] = ['--version'];
export const UPDATE_ARGS: readonly string[] = ['-U'];
