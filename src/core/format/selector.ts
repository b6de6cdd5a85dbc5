// src/core/format/selector.ts

export type FormatSpec = readonly string[];

function normalizeHeight(height: number): number {
  if (!Number.isFinite(height) || height <= 0) return 0;
  return Math.trunc(height);
}

/**
 * Ordered yt-dlp format selectors for a target height (0 = unconstrained).
 *
 * VOD prefers separate mp4 video + m4a audio, then progressively drops the
 * protocol, container and height constraints. Live prefers progressive
 * (non-HLS) delivery. Every chain ends with a bare `best`.
 */
export function selectFormats(height: number, isLive: boolean): FormatSpec {
  const h = normalizeHeight(height);
  const cap = h > 0 ? `[height<=${h}]` : '';

  if (isLive) {
    const chain = [
      `best${cap}[protocol!=m3u8]`,
      `best${cap}[protocol!=m3u8_native]`,
    ];
    if (h > 0) {
      chain.push(`best${cap}`);
    }
    chain.push('best');
    return chain;
  }

  const chain = [
    `bestvideo${cap}[ext=mp4][protocol!=m3u8]+bestaudio[ext=m4a]`,
    `best${cap}[ext=mp4][protocol!=m3u8]`,
  ];
  if (h > 0) {
    chain.push(`best${cap}[ext=mp4]`);
  }
  chain.push('best[ext=mp4]', 'best');
  return chain;
}

export function buildFormatArgument(chain: FormatSpec): string {
  return chain.join('/');
}
