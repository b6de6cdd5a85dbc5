// src/core/config/constants.ts
export const APP_NAME = 'media-resolver';
export const WINDOWS_APP_DIR = 'MediaResolver';

export const TOOL_NAME = 'yt-dlp';
export const RELEASE_BASE_URL = 'https://github.com/yt-dlp/yt-dlp/releases/latest/download/';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds per invocation
export const DOWNLOAD_TIMEOUT = 120000; // 2 minutes for the binary download
// Largest delay setTimeout honours; longer ones fire after 1ms
export const MAX_TIMEOUT = 2_147_483_647;

// Substring of a direct URL that marks HLS (manifest) delivery
export const HLS_MARKER = 'm3u8';

export const BASE_TOOL_ARGS = ['--no-warnings', '--no-check-certificate'] as const;
