// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { ErrorCode, ResolverError } from '../errors.js';
import type { StreamQuality } from '../resolver/quality.js';
import type { MediaResolver, ResolvedStream } from '../types/index.js';

// Helper function to read from stdin (extracted for testability)
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export type UrlSource = 'file' | 'stdin';

export interface BatchOptions {
  source: UrlSource;
  filePath?: string;
  /** Used instead of reading the source when given */
  urls?: string[];
  quality?: StreamQuality;
  timeoutMs?: number;
  includeMetadata?: boolean;
  continueOnError: boolean;
  jsonl: boolean;
}

export interface BatchFailure {
  url: string;
  error: string;
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  skipped: number;
  duration: number;
  failures: BatchFailure[];
}

export type BatchResolver = Pick<MediaResolver, 'canHandle' | 'resolve'>;

export class BatchRunner {
  constructor(
    private readonly resolver: BatchResolver,
    private readonly print: (line: string) => void = (line) => console.log(line)
  ) {}

  async run(options: BatchOptions): Promise<BatchSummary> {
    const urls = options.urls ?? (await this.parseUrls(options.source, options.filePath));

    if (urls.length === 0) {
      return {
        total: 0,
        success: 0,
        failed: 0,
        skipped: 0,
        duration: 0,
        failures: [],
      };
    }

    const startTime = Date.now();
    const failures: BatchFailure[] = [];
    let successCount = 0;
    let skippedCount = 0;

    for (const url of urls) {
      if (!this.resolver.canHandle(url)) {
        skippedCount++;
        this.print(`⊘ ${url} (skipped: unsupported host)`);
        continue;
      }

      const result = await this.resolver.resolve(url, {
        quality: options.quality,
        timeoutMs: options.timeoutMs,
        includeMetadata: options.includeMetadata,
      });

      if (options.jsonl) {
        this.printJsonl(result);
      }

      if (result.success) {
        successCount++;
        this.print(`✓ ${url}`);
        continue;
      }

      failures.push({ url, error: result.error });
      this.print(`✗ ${url} (${result.errorCode})`);

      if (!options.continueOnError) {
        break;
      }
    }

    const summary: BatchSummary = {
      total: urls.length,
      success: successCount,
      failed: failures.length,
      skipped: skippedCount,
      duration: Date.now() - startTime,
      failures,
    };

    this.printSummary(summary);
    return summary;
  }

  async parseUrls(source: UrlSource, filePath?: string): Promise<string[]> {
    let content: string;

    if (source === 'file') {
      if (!filePath) {
        throw new ResolverError(
          ErrorCode.INVALID_PARAM,
          'File path is required when source is "file"'
        );
      }
      content = await readFile(filePath, 'utf-8');
    } else {
      content = await readStdin();
    }

    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  private printJsonl(result: ResolvedStream): void {
    this.print(JSON.stringify(result));
  }

  private printSummary(summary: BatchSummary): void {
    this.print('\n' + '━'.repeat(50));
    this.print(
      `Summary: ${summary.success} success, ${summary.skipped} skipped, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      this.print('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        this.print(`  - ${url}: ${error}`);
      });
    }
  }
}
