/**
 * `pipegen templates` - List the built-in templates
 */

import { Command } from 'commander';
import { createBuiltinRegistry } from '@pipegen/core';
import type { CliContext } from '../context.js';

export function createTemplatesCommand(context: CliContext): Command {
  const cmd = new Command('templates');

  cmd
    .description('List available project templates')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const summaries = createBuiltinRegistry().listSummaries();

      if (options.json) {
        context.output.log(JSON.stringify(summaries, null, 2));
        return;
      }

      for (const summary of summaries) {
        context.output.log(`${summary.name.padEnd(10)} ${summary.description}`);
        context.output.log(
          `${''.padEnd(10)} processors: ${summary.processorTypes.join(', ')} | services: ${summary.dockerServices.join(', ')}`
        );
      }
    });

  return cmd;
}
