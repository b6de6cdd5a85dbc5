// src/cli/commands/tool-version.ts
import { Command } from 'commander';
import { addToolOptions, reportFailure, type CliDeps, type ToolOptions } from '../options.js';

export function registerToolVersionCommand(program: Command, deps: CliDeps): void {
  const command = program
    .command('tool-version')
    .description('Print the version of the yt-dlp binary in use');

  addToolOptions(command).action(async (options: ToolOptions) => {
    try {
      const version = await deps.createResolver(options).getToolVersion();
      if (!version) {
        console.error('✗ yt-dlp is not available');
        process.exitCode = 1;
        return;
      }
      console.log(version);
    } catch (error) {
      reportFailure(error);
    }
  });
}
