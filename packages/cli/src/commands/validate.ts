/**
 * `pipegen validate <path>` - Check a generated project
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { NodeFileSystem, validateProject, type CheckStatus } from '@pipegen/core';
import type { CliContext } from '../context.js';

const STATUS_ICONS: Record<CheckStatus, string> = {
  ok: '✅',
  warning: '⚠️ ',
  error: '❌',
};

/**
 * Validation found errors
 */
export class ProjectValidationError extends Error {
  constructor(
    public readonly errors: number,
    public readonly warnings: number
  ) {
    super(`Validation failed: ${errors} errors, ${warnings} warnings`);
    this.name = 'ProjectValidationError';
  }
}

export function createValidateCommand(context: CliContext): Command {
  const cmd = new Command('validate');

  cmd
    .description('Validate a generated pipeline project')
    .argument('[path]', 'Project directory', '.')
    .action(async (path: string) => {
      const projectPath = resolve(path);
      const report = await validateProject(projectPath, context.fileSystem ?? new NodeFileSystem());

      context.output.log(`🔍 Validating ${projectPath}`);
      for (const check of report.checks) {
        context.output.log(`${STATUS_ICONS[check.status]} ${check.message}`);
      }
      context.output.log('');

      if (!report.passed) {
        throw new ProjectValidationError(report.errors, report.warnings);
      }

      context.output.log(`🎉 Validation passed with ${report.warnings} warnings`);
    });

  return cmd;
}
