import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ProjectGenerator } from '../generator.js';
import { NodeFileSystem } from '../fs/node-fs.js';
import { silentLogger } from '../logger.js';
import { validateProject } from '../validator.js';

describe('ProjectGenerator on disk', () => {
  let outputDir: string;
  let fileSystem: NodeFileSystem;
  let generator: ProjectGenerator;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'pipegen-'));
    fileSystem = new NodeFileSystem();
    generator = new ProjectGenerator({ outputDir, fileSystem, logger: silentLogger });
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('should write executable scripts with mode 0755', async () => {
    await generator.generate('demo', 'security');

    const devScript = await stat(join(outputDir, 'demo', 'scripts', 'dev.sh'));
    const stub = await stat(join(outputDir, 'demo', 'processors', 'object_detection.py'));
    const goMod = await stat(join(outputDir, 'demo', 'processors', 'threat_analysis', 'go.mod'));

    expect(devScript.mode & 0o777).toBe(0o755);
    expect(stub.mode & 0o777).toBe(0o755);
    expect(goMod.mode & 0o111).toBe(0);
  });

  it('should list generated files', async () => {
    const result = await generator.generate('demo', 'basic');

    expect(await fileSystem.listFiles(join(outputDir, 'demo'))).toEqual([...result.files].sort());
  });

  it('should overwrite with byte-identical content on re-run', async () => {
    const first = await generator.generate('demo', 'iot');
    const before = await Promise.all(
      first.files.map((file) => readFile(join(outputDir, 'demo', file), 'utf-8'))
    );

    const second = await generator.generate('demo', 'iot');
    const after = await Promise.all(
      second.files.map((file) => readFile(join(outputDir, 'demo', file), 'utf-8'))
    );

    expect(second.files).toEqual(first.files);
    expect(after).toEqual(before);
  });

  it('should produce a project that passes validation', async () => {
    const result = await generator.generate('demo', 'security');

    const report = await validateProject(result.projectPath, fileSystem);

    expect(report.errors).toBe(0);
    expect(report.warnings).toBe(0);
    expect(report.passed).toBe(true);
  });

  it('should report missing files as FilesystemError', async () => {
    await expect(fileSystem.readFile(join(outputDir, 'missing.txt'))).rejects.toMatchObject({
      name: 'FilesystemError',
      code: 'ENOENT',
    });
  });
});
