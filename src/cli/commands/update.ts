// src/cli/commands/update.ts
import { Command } from 'commander';
import { addToolOptions, reportFailure, type CliDeps, type ToolOptions } from '../options.js';

export function registerUpdateCommand(program: Command, deps: CliDeps): void {
  const command = program
    .command('update')
    .description('Run the yt-dlp self-updater');

  addToolOptions(command).action(async (options: ToolOptions) => {
    try {
      const resolver = deps.createResolver(options);
      const result = await resolver.updateTool();

      if (!result.success) {
        console.error(`✗ ${result.error} (${result.errorCode})`);
        process.exitCode = 1;
        return;
      }

      const version = await resolver.getToolVersion();
      console.log(`✓ yt-dlp is up to date${version ? ` (${version})` : ''}`);
    } catch (error) {
      reportFailure(error);
    }
  });
}
