// src/core/resolver/quality.ts
import { ErrorCode, ResolverError } from '../errors.js';

export const QUALITY_HEIGHTS = {
  auto: 0,
  '360p': 360,
  '480p': 480,
  '720p': 720,
  '1080p': 1080,
  '1440p': 1440,
  '4k': 2160,
} as const;

export type QualityTier = keyof typeof QUALITY_HEIGHTS;

/** A named tier or a target height in pixels (0 = no constraint) */
export type StreamQuality = QualityTier | number;

function isQualityTier(value: string): value is QualityTier {
  return Object.prototype.hasOwnProperty.call(QUALITY_HEIGHTS, value);
}

export function qualityToHeight(quality: StreamQuality): number {
  if (typeof quality === 'number') {
    return Number.isFinite(quality) && quality > 0 ? Math.trunc(quality) : 0;
  }
  return QUALITY_HEIGHTS[quality];
}

/**
 * Accepts "720", "720p", "4k", "2160p", "auto" (case-insensitive).
 */
export function parseQuality(value: string): StreamQuality {
  const normalized = value.trim().toLowerCase();

  if (isQualityTier(normalized)) {
    return normalized;
  }

  const match = normalized.match(/^(\d+)p?$/);
  if (match) {
    return Number(match[1]);
  }

  throw new ResolverError(
    ErrorCode.INVALID_PARAM,
    `Invalid quality: ${value}`,
    false,
    `Use a height such as 720, or one of: ${Object.keys(QUALITY_HEIGHTS).join(', ')}`
  );
}
