import type { Command } from 'commander';
import { withCommandContext } from '@cli/utils.js';
import { formatJson } from '@cli/formatters/store-formatter.js';

export function registerConfigCommand(parent: Command): void {
  parent
    .command('config')
    .description('Show the resolved configuration (defaults, config.json, LOCALKV_* env, flags)')
    .action(withCommandContext((ctx) => {
      const { config } = ctx;

      if (ctx.globalOpts.json) {
        console.log(formatJson(config));
        return;
      }

      console.log(`home:         ${config.home}`);
      console.log(`directory:    ${config.directory}`);
      console.log(`flushDelayMs: ${config.flushDelayMs}`);
      console.log(`indent:       ${config.indent}`);
      console.log(`logLevel:     ${config.logLevel}`);
      console.log(`logJson:      ${config.logJson}`);
    }));
}
