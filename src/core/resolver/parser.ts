// src/core/resolver/parser.ts
import { HLS_MARKER } from '../config/constants.js';

// yt-dlp prints "NA" for fields it could not determine
const MISSING = 'NA';

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/).map(line => line.trim());
}

function presentValue(line: string | undefined): string | undefined {
  if (line === undefined || line === '' || line === MISSING) return undefined;
  return line;
}

function parseNumber(line: string | undefined): number | undefined {
  const value = presentValue(line);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseBooleanFlag(output: string): boolean {
  return output.trim().toLowerCase() === 'true';
}

export interface DirectUrls {
  directUrl: string;
  audioUrl?: string;
}

/**
 * `--get-url` prints one URL per selected format: a single line for a muxed
 * format, video then audio for a `bestvideo+bestaudio` pair.
 */
export function parseDirectUrls(output: string): DirectUrls | null {
  const urls = splitLines(output).filter(line => line.length > 0);
  if (urls.length === 0) return null;
  return urls.length > 1 ? { directUrl: urls[0], audioUrl: urls[1] } : { directUrl: urls[0] };
}

export function isHlsUrl(url: string): boolean {
  return url.includes(HLS_MARKER);
}

export interface StreamMetadata {
  title?: string;
  width: number;
  height: number;
}

/** title, width, height, one per line */
export function parseMetadata(output: string): StreamMetadata {
  const [title, width, height] = splitLines(output);
  return {
    title: presentValue(title),
    width: Math.trunc(parseNumber(width) ?? 0),
    height: Math.trunc(parseNumber(height) ?? 0),
  };
}

export interface ProbeFields {
  title?: string;
  isLive: boolean;
  duration?: number;
}

/** title, is_live, duration, one per line */
export function parseProbe(output: string): ProbeFields {
  const [title, isLive, duration] = splitLines(output);
  return {
    title: presentValue(title),
    isLive: parseBooleanFlag(isLive ?? ''),
    duration: parseNumber(duration),
  };
}
