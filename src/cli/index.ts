#!/usr/bin/env node

import { Command } from 'commander';
import { RESOLVER_VERSION } from '../core/resolver/info.js';
import { registerHostsCommand } from './commands/hosts.js';
import { registerInstallCommand } from './commands/install.js';
import { registerProbeCommand } from './commands/probe.js';
import { registerResolveCommand } from './commands/resolve.js';
import { registerToolVersionCommand } from './commands/tool-version.js';
import { registerUpdateCommand } from './commands/update.js';
import { defaultDeps, reportFailure, type CliDeps } from './options.js';

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('media-resolver')
    .description('Resolve video page URLs to direct media URLs with yt-dlp')
    .version(RESOLVER_VERSION);

  registerResolveCommand(program, deps);
  registerProbeCommand(program, deps);
  registerInstallCommand(program, deps);
  registerUpdateCommand(program, deps);
  registerToolVersionCommand(program, deps);
  registerHostsCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch(reportFailure);
}
