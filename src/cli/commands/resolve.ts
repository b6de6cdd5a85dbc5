// src/cli/commands/resolve.ts
import { Command } from 'commander';
import { BatchRunner } from '../../core/batch/runner.js';
import type { StreamQuality } from '../../core/resolver/quality.js';
import type { MediaResolver } from '../../core/types/index.js';
import { addToolOptions, parseQualityOption, reportFailure, type CliDeps, type ToolOptions } from '../options.js';

interface ResolveCommandOptions extends ToolOptions {
  quality: StreamQuality;
  metadata: boolean;
  json: boolean;
  jsonl: boolean;
  file?: string;
  stdin?: boolean;
  continueOnError?: boolean;
}

export function registerResolveCommand(program: Command, deps: CliDeps): void {
  const command = program
    .command('resolve')
    .description('Resolve a page URL to a direct media URL')
    .argument('[url]', 'URL to resolve (optional if using --file or --stdin)')
    .option('--quality <quality>', 'Maximum height: auto, 360p, 480p, 720p, 1080p, 1440p, 4k or a number', parseQualityOption, 'auto')
    .option('--no-metadata', 'Skip the title and dimensions lookup')
    .option('--json', 'Output JSON to stdout', false)
    .option('--jsonl', 'Output JSONL stream (batch mode)', false)
    .option('--file <path>', 'Read URLs from file')
    .option('--stdin', 'Read URLs from stdin')
    .option('--continue-on-error', 'Continue on failure (batch mode)');

  addToolOptions(command).action(async (url: string | undefined, options: ResolveCommandOptions) => {
    const hasUrl = url !== undefined && url.length > 0;
    const hasList = Boolean(options.file || options.stdin);

    if (!hasUrl && !hasList) {
      console.error('Error: URL argument or --file/--stdin is required');
      process.exitCode = 1;
      return;
    }

    try {
      const resolver = deps.createResolver(options);
      if (hasUrl && !hasList) {
        await handleSingleUrl(resolver, url, options);
      } else {
        await handleBatch(resolver, options);
      }
    } catch (error) {
      reportFailure(error);
    }
  });
}

async function handleSingleUrl(resolver: MediaResolver, url: string, options: ResolveCommandOptions): Promise<void> {
  const result = await resolver.resolve(url, {
    quality: options.quality,
    timeoutMs: options.timeout,
    includeMetadata: options.metadata,
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  }

  if (!result.success) {
    console.error(`✗ ${result.error} (${result.errorCode})`);
    process.exitCode = 1;
    return;
  }

  if (!options.json) {
    console.log(result.directUrl);
    if (result.audioUrl) {
      console.log(result.audioUrl);
    }
  }
}

async function handleBatch(resolver: MediaResolver, options: ResolveCommandOptions): Promise<void> {
  const runner = new BatchRunner(resolver);

  const summary = await runner.run({
    source: options.file ? 'file' : 'stdin',
    filePath: options.file,
    quality: options.quality,
    timeoutMs: options.timeout,
    includeMetadata: options.metadata,
    continueOnError: options.continueOnError ?? false,
    jsonl: options.jsonl,
  });

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}
