import { describe, it, expect, beforeEach } from 'vitest';
import { ProjectGenerator } from '../generator.js';
import { InMemoryFileSystem } from '../fs/memory-fs.js';
import { silentLogger } from '../logger.js';
import { validateProject } from '../validator.js';
import type { ValidationReport } from '../validator.js';

const CYCLIC_DESCRIPTOR = `name: demo
version: 1.0.0
triggers: []
processors:
  - id: a
    type: python
    parallel: true
    timeout: 100
    retry: 0
    dependencies: [b]
  - id: b
    type: python
    parallel: true
    timeout: 100
    retry: 0
    dependencies: [a]
outputs: []
settings: {}
`;

const messages = (report: ValidationReport, status: 'ok' | 'warning' | 'error') =>
  report.checks.filter((check) => check.status === status).map((check) => check.message);

describe('validateProject', () => {
  let fileSystem: InMemoryFileSystem;
  let generator: ProjectGenerator;

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
    generator = new ProjectGenerator({ outputDir: '/work', fileSystem, logger: silentLogger });
  });

  it('should pass a freshly generated project', async () => {
    await generator.generate('demo', 'basic');

    const report = await validateProject('/work/demo', fileSystem);

    expect(report.passed).toBe(true);
    expect(report.errors).toBe(0);
    expect(report.warnings).toBe(0);
    expect(messages(report, 'ok')).toEqual([
      'Found: pipeline.yaml',
      'Found: requirements.txt',
      'Found: Dockerfile',
      'Found: docker-compose.yml',
      'Found: .gitignore',
      'Found: README.md',
      'Found directory: processors',
      'Found directory: configs',
      'Found directory: scripts',
      'Found directory: tests',
      'Found directory: logs',
      'Valid YAML: pipeline.yaml',
      'Valid YAML: docker-compose.yml',
      'Descriptor structure valid: demo 1.0.0',
      'Processor dependencies form a DAG',
      'Found 1 processor files',
      'Python processor: main_processor.py',
      'Executable script: dev.sh',
    ]);
  });

  it('should check go modules', async () => {
    await generator.generate('cam', 'security');

    const report = await validateProject('/work/cam', fileSystem);

    expect(report.passed).toBe(true);
    expect(messages(report, 'ok')).toContain('Found 2 processor files');
    expect(messages(report, 'ok')).toContain('Go processor: threat_analysis/');
  });

  it('should fail when pipeline.yaml is missing', async () => {
    await fileSystem.ensureDir('/work/empty/processors');
    await fileSystem.writeFile('/work/empty/processors/run.py', '#!/usr/bin/env python3\n');

    const report = await validateProject('/work/empty', fileSystem);

    expect(report.passed).toBe(false);
    expect(messages(report, 'error')).toEqual(['Missing required file: pipeline.yaml']);
    expect(messages(report, 'warning')).toContain('Missing optional file: README.md');
    expect(messages(report, 'warning')).toContain('Missing optional directory: configs');
  });

  it('should fail on invalid YAML', async () => {
    await generator.generate('demo', 'basic');
    await fileSystem.writeFile('/work/demo/configs/broken.yaml', 'key: [unclosed');

    const report = await validateProject('/work/demo', fileSystem);

    expect(report.passed).toBe(false);
    expect(report.errors).toBe(1);
    expect(messages(report, 'error')[0]).toMatch(/^Invalid YAML syntax: configs\/broken\.yaml \(/);
    expect(messages(report, 'ok')).toContain('Valid YAML: pipeline.yaml');
  });

  it('should report dependency cycles', async () => {
    await generator.generate('demo', 'basic');
    await fileSystem.writeFile('/work/demo/pipeline.yaml', CYCLIC_DESCRIPTOR);

    const report = await validateProject('/work/demo', fileSystem);

    expect(messages(report, 'error')).toEqual(['Processor dependency cycle: a -> b -> a']);
  });

  it('should report dependencies on unknown processors', async () => {
    await generator.generate('demo', 'basic');
    await fileSystem.writeFile(
      '/work/demo/pipeline.yaml',
      CYCLIC_DESCRIPTOR.replace('dependencies: [a]', 'dependencies: [ghost]')
    );

    const report = await validateProject('/work/demo', fileSystem);

    expect(messages(report, 'error')).toEqual([
      "Processor 'b' depends on unknown processor 'ghost'",
    ]);
  });

  it('should report descriptor structure errors', async () => {
    await generator.generate('demo', 'basic');
    await fileSystem.writeFile('/work/demo/pipeline.yaml', 'name: demo\nversion: 1.0.0\n');

    const report = await validateProject('/work/demo', fileSystem);

    expect(messages(report, 'error')).toEqual([
      'pipeline.yaml: triggers: Required',
      'pipeline.yaml: processors: Required',
      'pipeline.yaml: outputs: Required',
      'pipeline.yaml: settings: Required',
    ]);
  });

  it('should fail when processors/ holds no sources', async () => {
    await fileSystem.writeFile('/work/bare/pipeline.yaml', CYCLIC_DESCRIPTOR.replace('[b]', '[]'));
    await fileSystem.ensureDir('/work/bare/processors');

    const report = await validateProject('/work/bare', fileSystem);

    expect(messages(report, 'error')).toEqual(['No processor files found']);
  });

  it('should warn about non-executable scripts and missing shebangs', async () => {
    await generator.generate('demo', 'basic');
    await fileSystem.writeFile('/work/demo/scripts/dev.sh', 'echo hi\n');
    await fileSystem.writeFile('/work/demo/processors/main_processor.py', 'print(1)\n');

    const report = await validateProject('/work/demo', fileSystem);

    expect(report.passed).toBe(true);
    expect(messages(report, 'warning')).toEqual([
      'Python processor missing shebang: main_processor.py',
      'Non-executable script: dev.sh',
    ]);
  });

  it('should warn when a go module has no go.mod', async () => {
    await generator.generate('cam', 'basic');
    await fileSystem.writeFile('/work/cam/processors/tool/main.go', 'package main\n');

    const report = await validateProject('/work/cam', fileSystem);

    expect(messages(report, 'warning')).toEqual(['Go processor missing go.mod: tool/']);
  });
});
