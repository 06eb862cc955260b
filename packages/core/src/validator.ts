import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { COMPOSE_FILENAME } from './container/compose.js';
import { DOCKERFILE_FILENAME } from './container/dockerfile.js';
import { REQUIREMENTS_FILENAME } from './dependencies/aggregator.js';
import { DESCRIPTOR_FILENAME, PipelineDescriptorSchema } from './descriptor/serializer.js';
import type { ProjectFileSystem } from './fs/types.js';
import { GITIGNORE_FILENAME, README_FILENAME } from './scaffold/readme.js';
import { findDependencyCycle } from './templates/graph.js';

export type CheckStatus = 'ok' | 'warning' | 'error';

export interface ValidationCheck {
  status: CheckStatus;
  message: string;
}

export interface ValidationReport {
  projectPath: string;
  passed: boolean;
  errors: number;
  warnings: number;
  checks: ValidationCheck[];
}

const REQUIRED_FILES = [DESCRIPTOR_FILENAME];
const OPTIONAL_FILES = [
  REQUIREMENTS_FILENAME,
  DOCKERFILE_FILENAME,
  COMPOSE_FILENAME,
  GITIGNORE_FILENAME,
  README_FILENAME,
];
const REQUIRED_DIRECTORIES = ['processors'];
const OPTIONAL_DIRECTORIES = ['configs', 'scripts', 'tests', 'logs'];

const PROCESSOR_SOURCE = /\.(py|go|js)$/;
const PYTHON_SHEBANG = '#!/usr/bin/env python3';

/**
 * Check a generated (and possibly hand-edited) project directory
 *
 * Missing required files/directories, unparsable YAML, an invalid descriptor,
 * dependency cycles and an empty processors/ directory are errors; everything
 * else is a warning. The project passes when there are no errors.
 *
 * @example
 * ```typescript
 * const report = await validateProject('/work/demo', new NodeFileSystem());
 * if (!report.passed) console.error(`${report.errors} errors`);
 * ```
 */
export async function validateProject(
  projectPath: string,
  fileSystem: ProjectFileSystem
): Promise<ValidationReport> {
  const checks: ValidationCheck[] = [];
  const ok = (message: string) => checks.push({ status: 'ok', message });
  const warn = (message: string) => checks.push({ status: 'warning', message });
  const fail = (message: string) => checks.push({ status: 'error', message });

  // Files and directories
  for (const file of [...REQUIRED_FILES, ...OPTIONAL_FILES]) {
    if (await fileSystem.exists(join(projectPath, file))) {
      ok(`Found: ${file}`);
    } else if (REQUIRED_FILES.includes(file)) {
      fail(`Missing required file: ${file}`);
    } else {
      warn(`Missing optional file: ${file}`);
    }
  }

  for (const directory of [...REQUIRED_DIRECTORIES, ...OPTIONAL_DIRECTORIES]) {
    if (await fileSystem.isDirectory(join(projectPath, directory))) {
      ok(`Found directory: ${directory}`);
    } else if (REQUIRED_DIRECTORIES.includes(directory)) {
      fail(`Missing required directory: ${directory}`);
    } else {
      warn(`Missing optional directory: ${directory}`);
    }
  }

  // YAML files
  const configFiles = (await fileSystem.listFiles(join(projectPath, 'configs')))
    .filter((file) => /\.ya?ml$/.test(file))
    .map((file) => `configs/${file}`);

  let descriptor: unknown;
  for (const file of [DESCRIPTOR_FILENAME, COMPOSE_FILENAME, ...configFiles]) {
    const path = join(projectPath, file);
    if (!(await fileSystem.exists(path))) continue;

    try {
      const parsed: unknown = parseYaml(await fileSystem.readFile(path));
      ok(`Valid YAML: ${file}`);
      if (file === DESCRIPTOR_FILENAME) descriptor = parsed;
    } catch (error) {
      fail(`Invalid YAML syntax: ${file} (${error instanceof Error ? error.message : 'Unknown'})`);
    }
  }

  if (descriptor !== undefined) {
    checkDescriptor(descriptor, ok, fail);
  }

  // Processor sources
  const processorFiles = await fileSystem.listFiles(join(projectPath, 'processors'));
  const sources = processorFiles.filter((file) => PROCESSOR_SOURCE.test(file));

  if (sources.length > 0) {
    ok(`Found ${sources.length} processor files`);
  } else if (await fileSystem.isDirectory(join(projectPath, 'processors'))) {
    fail('No processor files found');
  }

  for (const file of sources.filter((f) => f.endsWith('.py'))) {
    const firstLine = (await fileSystem.readFile(join(projectPath, 'processors', file))).split('\n')[0];
    if (firstLine === PYTHON_SHEBANG) {
      ok(`Python processor: ${file}`);
    } else {
      warn(`Python processor missing shebang: ${file}`);
    }
  }

  for (const file of processorFiles.filter((f) => f === 'main.go' || f.endsWith('/main.go'))) {
    const dir = file.slice(0, -'main.go'.length);
    if (processorFiles.includes(`${dir}go.mod`)) {
      ok(`Go processor: ${dir || '.'}`);
    } else {
      warn(`Go processor missing go.mod: ${dir || '.'}`);
    }
  }

  // Scripts
  const scripts = (await fileSystem.listFiles(join(projectPath, 'scripts'))).filter((file) =>
    file.endsWith('.sh')
  );
  for (const script of scripts) {
    if (await fileSystem.isExecutable(join(projectPath, 'scripts', script))) {
      ok(`Executable script: ${script}`);
    } else {
      warn(`Non-executable script: ${script}`);
    }
  }

  const errors = checks.filter((check) => check.status === 'error').length;
  const warnings = checks.filter((check) => check.status === 'warning').length;

  return { projectPath, passed: errors === 0, errors, warnings, checks };
}

function checkDescriptor(
  descriptor: unknown,
  ok: (message: string) => void,
  fail: (message: string) => void
): void {
  const result = PipelineDescriptorSchema.safeParse(descriptor);

  if (!result.success) {
    for (const issue of result.error.errors) {
      fail(`${DESCRIPTOR_FILENAME}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return;
  }

  ok(`Descriptor structure valid: ${result.data.name} ${result.data.version}`);

  const { processors } = result.data;
  const ids = new Set(processors.map((processor) => processor.id));
  let dependenciesResolve = true;

  for (const processor of processors) {
    for (const dependency of processor.dependencies) {
      if (!ids.has(dependency)) {
        dependenciesResolve = false;
        fail(`Processor '${processor.id}' depends on unknown processor '${dependency}'`);
      }
    }
  }

  const cycle = findDependencyCycle(processors);
  if (cycle) {
    fail(`Processor dependency cycle: ${cycle.join(' -> ')}`);
  } else if (dependenciesResolve) {
    ok('Processor dependencies form a DAG');
  }
}
