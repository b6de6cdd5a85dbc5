// src/cli/commands/probe.ts
import { Command } from 'commander';
import { addToolOptions, reportFailure, type CliDeps, type ToolOptions } from '../options.js';

interface ProbeCommandOptions extends ToolOptions {
  json: boolean;
}

function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const mm = String(m).padStart(2, '0');
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}:${mm}:${ss}` : `${m}:${ss}`;
}

export function registerProbeCommand(program: Command, deps: CliDeps): void {
  const command = program
    .command('probe <url>')
    .description('Show title, live status and duration without resolving')
    .option('--json', 'Output JSON to stdout', false);

  addToolOptions(command).action(async (url: string, options: ProbeCommandOptions) => {
    try {
      const resolver = deps.createResolver(options);
      const result = await resolver.probe(url, { timeoutMs: options.timeout });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      }

      if (!result.success) {
        console.error(`✗ ${result.error ?? 'Probe failed'}${result.errorCode ? ` (${result.errorCode})` : ''}`);
        process.exitCode = 1;
        return;
      }

      if (!options.json) {
        console.log('Title:', result.title ?? '(unknown)');
        console.log('Live:', result.isLive ? 'yes' : 'no');
        if (result.duration !== undefined) {
          console.log('Duration:', formatDuration(result.duration));
        }
      }
    } catch (error) {
      reportFailure(error);
    }
  });
}
