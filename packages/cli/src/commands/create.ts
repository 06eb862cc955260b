/**
 * `pipegen create <name> [template]` - Generate a pipeline project
 */

import { Command, Option } from 'commander';
import {
  configFromEnv,
  DEFAULT_TEMPLATE,
  LOG_LEVELS,
  ProjectGenerator,
  type GenerationStep,
  type GeneratorConfig,
  type LogLevel,
} from '@pipegen/core';
import type { CliContext } from '../context.js';

interface CreateOptions {
  output?: string;
  strict?: boolean;
  logLevel?: string;
}

const STEP_MESSAGES: Record<GenerationStep, (files: string[]) => string> = {
  directories: () => '📁 Created directory structure',
  descriptor: () => '⚙️  Wrote pipeline.yaml',
  processors: (files) => `🔧 Generated ${files.length} processor stub files`,
  container: () => '🐳 Wrote Dockerfile and docker-compose.yml',
  scripts: () => '📜 Wrote development scripts',
  dependencies: () => '📦 Wrote requirements.txt',
  documentation: () => '📝 Wrote README.md and .gitignore',
};

export function createCreateCommand(context: CliContext): Command {
  const cmd = new Command('create');

  cmd
    .description('Create a new pipeline project from a template')
    .argument('<name>', 'Project directory name')
    .argument('[template]', 'Template name (see `pipegen templates`)', DEFAULT_TEMPLATE)
    .option('-o, --output <dir>', 'Directory to create the project in')
    .option('--strict', 'Fail on processor types that have no stub generator')
    .addOption(new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVELS))
    .action(async (name: string, template: string, options: CreateOptions) => {
      await createProject(context, name, template, options);
    });

  return cmd;
}

async function createProject(
  context: CliContext,
  name: string,
  templateName: string,
  options: CreateOptions
): Promise<void> {
  const { output } = context;
  const env = configFromEnv(context.env);

  const config: GeneratorConfig = {
    ...env,
    logLevel: parseLogLevel(options.logLevel) ?? env.logLevel ?? 'warn',
    fileSystem: context.fileSystem,
  };
  if (options.output !== undefined) config.outputDir = options.output;
  if (options.strict) config.strict = true;

  const generator = new ProjectGenerator(config);

  generator.on('step:complete', (step, files) => output.log(STEP_MESSAGES[step](files)));
  generator.on('processor:skipped', ({ id, type }) =>
    output.log(`⚠️  Skipped processor '${id}' (no stub generator for type '${type}')`)
  );

  output.log(`🚀 Creating project '${name}' from template '${templateName}'`);

  const result = await generator.generate(name, templateName);

  output.log('');
  output.log(`✅ Project '${result.projectName}' created at ${result.projectPath}`);
  output.log('');
  output.log('Next steps:');
  result.nextSteps.forEach((step, index) => output.log(`  ${index + 1}. ${step}`));
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}
