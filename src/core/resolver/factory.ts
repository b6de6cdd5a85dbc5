// src/core/resolver/factory.ts
import type { ProcessRunner } from '../process/runner.js';
import type { ToolContext } from '../tool/context.js';
import type { ResolverInfo } from '../types/index.js';
import { canHandleUrl } from './hosts.js';
import { RESOLVER_INFO } from './info.js';
import { StreamResolver } from './stream-resolver.js';

export interface ResolverFactory {
  readonly info: ResolverInfo;
  canHandle(url: string): boolean;
  create(context?: ToolContext, runner?: ProcessRunner): StreamResolver;
  destroy(resolver: StreamResolver): void;
}

export const ytdlpResolverFactory: ResolverFactory = {
  info: RESOLVER_INFO,

  canHandle(url: string): boolean {
    return canHandleUrl(url, RESOLVER_INFO.hosts);
  },

  create(context?: ToolContext, runner?: ProcessRunner): StreamResolver {
    return new StreamResolver(context, runner);
  },

  destroy(resolver: StreamResolver): void {
    resolver.destroy();
  },
};
