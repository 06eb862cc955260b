/**
 * `pipegen processors` - List processor types that get a generated stub
 */

import { Command } from 'commander';
import { createDefaultSynthesizers } from '@pipegen/core';
import type { CliContext } from '../context.js';

export function createProcessorsCommand(context: CliContext): Command {
  const cmd = new Command('processors');

  cmd.description('List supported processor types').action(() => {
    for (const synthesizer of createDefaultSynthesizers().list()) {
      context.output.log(
        `${synthesizer.type.padEnd(10)} ${synthesizer.kind.padEnd(12)} ${synthesizer.description}`
      );
    }
  });

  return cmd;
}
