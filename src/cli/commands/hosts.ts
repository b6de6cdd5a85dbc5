// src/cli/commands/hosts.ts
import { Command } from 'commander';
import { ytdlpResolverFactory } from '../../core/resolver/factory.js';

export function registerHostsCommand(program: Command): void {
  program
    .command('hosts')
    .description('List supported hosts, or check whether a URL is supported')
    .argument('[url]', 'URL to check')
    .action((url: string | undefined) => {
      if (url === undefined) {
        ytdlpResolverFactory.info.hosts.forEach((host) => console.log(host));
        return;
      }

      if (ytdlpResolverFactory.canHandle(url)) {
        console.log(`✓ ${url}`);
      } else {
        console.log(`⊘ ${url} (unsupported host)`);
        process.exitCode = 1;
      }
    });
}
