// src/core/resolver/info.ts
import type { ResolverCapabilities, ResolverInfo } from '../types/index.js';
import { SUPPORTED_HOSTS } from './hosts.js';

export const RESOLVER_VERSION = '0.1.0';

export const RESOLVER_CAPABILITIES: ResolverCapabilities = {
  vod: true,
  live: true,
  qualitySelection: true,
  // Request headers/cookies are not extracted from yt-dlp yet
  customHeaders: false,
  selfDownload: true,
  selfUpdate: true,
};

export const RESOLVER_INFO: ResolverInfo = {
  id: 'media-resolver.ytdlp',
  name: 'yt-dlp',
  version: RESOLVER_VERSION,
  description: 'URL resolver for YouTube, Twitch and other sites supported by yt-dlp',
  capabilities: RESOLVER_CAPABILITIES,
  hosts: SUPPORTED_HOSTS,
};
