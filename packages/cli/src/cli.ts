/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { createCreateCommand } from './commands/create.js';
import { createProcessorsCommand } from './commands/processors.js';
import { createTemplatesCommand } from './commands/templates.js';
import { createValidateCommand } from './commands/validate.js';
import { consoleOutput, type CliContext } from './context.js';
import { NAME, VERSION } from './version.js';

export { ProjectValidationError } from './commands/validate.js';
export type { CliContext, CliOutput } from './context.js';

export function createCLI(overrides: Partial<CliContext> = {}): Command {
  const context: CliContext = {
    output: overrides.output ?? consoleOutput,
    env: overrides.env ?? process.env,
    fileSystem: overrides.fileSystem,
  };

  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Scaffold data-processing pipeline projects from templates');

  program.addCommand(createCreateCommand(context));
  program.addCommand(createTemplatesCommand(context));
  program.addCommand(createProcessorsCommand(context));
  program.addCommand(createValidateCommand(context));

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
