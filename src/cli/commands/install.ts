// src/cli/commands/install.ts
import { Command } from 'commander';
import type { ProgressCallback } from '../../core/types/index.js';
import { addToolOptions, reportFailure, type CliDeps, type ToolOptions } from '../options.js';

/** Reports download progress in 10% steps on stderr */
export function createProgressPrinter(write: (line: string) => void = (line) => console.error(line)): ProgressCallback {
  let lastStep = -1;
  return (progress) => {
    const step = Math.floor(Math.min(Math.max(progress, 0), 1) * 10);
    if (step > lastStep) {
      lastStep = step;
      write(`Downloading yt-dlp... ${step * 10}%`);
    }
  };
}

export function registerInstallCommand(program: Command, deps: CliDeps): void {
  const command = program
    .command('install')
    .description('Download yt-dlp unless a usable binary is already present');

  addToolOptions(command).action(async (options: ToolOptions) => {
    try {
      const resolver = deps.createResolver(options);
      const result = await resolver.ensureAvailable(createProgressPrinter());

      if (!result.success) {
        console.error(`✗ ${result.error} (${result.errorCode})`);
        process.exitCode = 1;
        return;
      }

      console.log(`✓ yt-dlp available at ${result.path ?? '(unknown path)'}`);
    } catch (error) {
      reportFailure(error);
    }
  });
}
