import { EventEmitter } from 'eventemitter3';
import { join, resolve } from 'path';
import { renderCompose, COMPOSE_FILENAME } from './container/compose.js';
import { renderDockerfile, DOCKERFILE_FILENAME } from './container/dockerfile.js';
import { renderRequirements, REQUIREMENTS_FILENAME } from './dependencies/aggregator.js';
import { serializePipeline, DESCRIPTOR_FILENAME } from './descriptor/serializer.js';
import { errorCode, FilesystemError, GenerationError, InvalidProjectNameError } from './errors.js';
import { NodeFileSystem } from './fs/node-fs.js';
import type { ProjectFileSystem, WriteOptions } from './fs/types.js';
import { createConsoleLogger } from './logger.js';
import { TextRenderer } from './rendering/renderer.js';
import { renderDevScript, DEV_SCRIPT_PATH } from './scaffold/dev-script.js';
import {
  buildNextSteps,
  renderReadme,
  GITIGNORE_FILENAME,
  README_FILENAME,
} from './scaffold/readme.js';
import { createDefaultSynthesizers } from './stubs/index.js';
import type { SynthesizerRegistry } from './stubs/registry.js';
import { createBuiltinRegistry, DEFAULT_TEMPLATE } from './templates/builtin.js';
import type { TemplateRegistry } from './templates/registry.js';
import type { ProjectTemplate } from './templates/schema.js';
import type {
  GenerationResult,
  GenerationStep,
  GeneratorConfig,
  GeneratorEvents,
  Logger,
  SkippedProcessor,
} from './types.js';

/**
 * Subdirectories created in every project
 */
export const PROJECT_DIRECTORIES: readonly string[] = [
  'processors',
  'scripts',
  'configs',
  'logs',
  'cache',
  'models',
  'data',
  'tests',
  'docs',
];

/**
 * State shared by the steps of one generate() call
 */
interface GenerationRun {
  projectName: string;
  projectPath: string;
  template: ProjectTemplate;
  files: string[];
  skippedProcessors: SkippedProcessor[];
}

/**
 * ProjectGenerator - Materializes a project directory from a named template
 *
 * Steps run strictly in order, each awaited before the next starts. A failing
 * file operation stops the run with a FilesystemError and leaves what was
 * already written; running again with the same arguments overwrites it.
 * Concurrent runs into the same project path must be serialized by the caller.
 *
 * @example
 * ```typescript
 * const generator = new ProjectGenerator({ outputDir: '/work' });
 *
 * generator.on('step:complete', (step) => console.log(`done: ${step}`));
 *
 * const result = await generator.generate('camera-watch', 'security');
 * console.log(result.nextSteps.join('\n'));
 * ```
 */
export class ProjectGenerator extends EventEmitter<GeneratorEvents> {
  private readonly registry: TemplateRegistry;
  private readonly synthesizers: SynthesizerRegistry;
  private readonly fileSystem: ProjectFileSystem;
  private readonly renderer: TextRenderer;
  private readonly logger: Logger;
  private readonly outputDir: string;
  private readonly strict: boolean;
  private readonly clock: () => Date;

  constructor(config: GeneratorConfig = {}) {
    super();
    this.registry = config.registry ?? createBuiltinRegistry();
    this.synthesizers = config.synthesizers ?? createDefaultSynthesizers();
    this.fileSystem = config.fileSystem ?? new NodeFileSystem();
    this.logger = config.logger ?? createConsoleLogger(config.logLevel ?? 'info');
    this.outputDir = resolve(config.outputDir ?? process.cwd());
    this.strict = config.strict ?? false;
    this.clock = config.clock ?? (() => new Date());
    this.renderer = new TextRenderer();

    this.logger.debug('ProjectGenerator initialized', {
      outputDir: this.outputDir,
      templates: this.registry.listNames(),
      processorTypes: this.synthesizers.listTypes(),
      strict: this.strict,
    });
  }

  /**
   * Generate a project
   *
   * @param projectName - Directory name of the new project (single path segment)
   * @param templateName - Registered template name
   * @returns Written files, skipped processors and next-step instructions
   * @throws InvalidProjectNameError or TemplateNotFoundError before touching the file system
   * @throws FilesystemError naming the failing step
   * @throws UnsupportedProcessorTypeError in strict mode
   */
  async generate(projectName: string, templateName: string = DEFAULT_TEMPLATE): Promise<GenerationResult> {
    validateProjectName(projectName);
    const template = this.registry.lookup(templateName);
    const startedAt = this.clock();

    const run: GenerationRun = {
      projectName,
      projectPath: join(this.outputDir, projectName),
      template,
      files: [],
      skippedProcessors: [],
    };

    this.logger.info('Generating project', {
      projectName,
      template: template.name,
      projectPath: run.projectPath,
    });

    await this.runStep(run, 'directories', () => this.createDirectories(run));
    await this.runStep(run, 'descriptor', () => this.writeDescriptor(run));
    await this.runStep(run, 'processors', () => this.writeProcessors(run));
    await this.runStep(run, 'container', () => this.writeContainerFiles(run));
    await this.runStep(run, 'scripts', () => this.writeScripts(run));
    await this.runStep(run, 'dependencies', () => this.writeDependencies(run));
    await this.runStep(run, 'documentation', () => this.writeDocumentation(run));

    const generatedAt = this.clock();
    const result: GenerationResult = {
      projectName,
      projectPath: run.projectPath,
      template: template.name,
      files: run.files,
      skippedProcessors: run.skippedProcessors,
      nextSteps: buildNextSteps(run.projectPath, template),
      generatedAt,
      duration: generatedAt.getTime() - startedAt.getTime(),
    };

    this.logger.info(`Project '${projectName}' generated`, {
      files: result.files.length,
      skippedProcessors: result.skippedProcessors.length,
    });
    this.emit('complete', result);

    return result;
  }

  /**
   * Run one step, reporting progress
   *
   * Errors carrying an errno code become FilesystemError; anything else that
   * is not already a GenerationError is wrapped in one.
   */
  private async runStep(
    run: GenerationRun,
    step: GenerationStep,
    action: () => Promise<void>
  ): Promise<void> {
    const before = run.files.length;
    this.emit('step:start', step);

    try {
      await action();
    } catch (error) {
      this.logger.error(`Generation step '${step}' failed`, {
        projectPath: run.projectPath,
        error: error instanceof Error ? error.message : 'Unknown',
      });

      if (error instanceof FilesystemError || errorCode(error) !== undefined) {
        throw FilesystemError.fromStep(step, run.projectPath, error);
      }
      if (error instanceof GenerationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GenerationError(`Step '${step}' failed for ${run.projectPath}: ${reason}`, error);
    }

    this.emit('step:complete', step, run.files.slice(before));
  }

  private async createDirectories(run: GenerationRun): Promise<void> {
    await this.fileSystem.ensureDir(run.projectPath);

    for (const directory of PROJECT_DIRECTORIES) {
      await this.fileSystem.ensureDir(join(run.projectPath, directory));
    }

    this.logger.debug('Directory structure created', { directories: PROJECT_DIRECTORIES });
  }

  private async writeDescriptor(run: GenerationRun): Promise<void> {
    await this.write(run, DESCRIPTOR_FILENAME, serializePipeline(run.template, run.projectName));
  }

  private async writeProcessors(run: GenerationRun): Promise<void> {
    for (const processor of run.template.processors) {
      const files = this.synthesizers.synthesize(
        { projectName: run.projectName, processor, renderer: this.renderer },
        { strict: this.strict }
      );

      if (files === null) {
        const skipped: SkippedProcessor = { id: processor.id, type: processor.type };
        run.skippedProcessors.push(skipped);
        this.logger.warn(`No synthesizer for processor type '${processor.type}', skipping`, skipped);
        this.emit('processor:skipped', skipped);
        continue;
      }

      for (const file of files) {
        await this.write(run, file.path, file.content, { executable: file.executable });
      }
    }
  }

  private async writeContainerFiles(run: GenerationRun): Promise<void> {
    await this.write(run, DOCKERFILE_FILENAME, renderDockerfile(run.template, this.renderer));
    await this.write(run, COMPOSE_FILENAME, renderCompose(run.template, run.projectName));
  }

  private async writeScripts(run: GenerationRun): Promise<void> {
    await this.write(run, DEV_SCRIPT_PATH, renderDevScript(run.projectName, this.renderer), {
      executable: true,
    });
  }

  private async writeDependencies(run: GenerationRun): Promise<void> {
    await this.write(run, REQUIREMENTS_FILENAME, renderRequirements(run.template));
  }

  private async writeDocumentation(run: GenerationRun): Promise<void> {
    await this.write(run, GITIGNORE_FILENAME, this.renderer.raw('project/gitignore'));
    await this.write(
      run,
      README_FILENAME,
      renderReadme(run.template, run.projectName, this.renderer)
    );
  }

  private async write(
    run: GenerationRun,
    relativePath: string,
    content: string,
    options?: WriteOptions
  ): Promise<void> {
    await this.fileSystem.writeFile(join(run.projectPath, relativePath), content, options);
    run.files.push(relativePath);
    this.logger.debug(`Wrote ${relativePath}`);
  }

  /**
   * Get template registry
   */
  get templates(): TemplateRegistry {
    return this.registry;
  }

  /**
   * Get processor type dispatch table
   */
  get processorTypes(): SynthesizerRegistry {
    return this.synthesizers;
  }
}

// Same alphabet as compose service names
const PROJECT_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Reject names that are not a single usable path segment
 *
 * @throws InvalidProjectNameError
 */
export function validateProjectName(projectName: string): void {
  if (projectName.trim().length === 0) {
    throw new InvalidProjectNameError(projectName, 'name is empty');
  }
  if (projectName === '.' || projectName === '..') {
    throw new InvalidProjectNameError(projectName, 'name must not be a relative directory reference');
  }
  if (!PROJECT_NAME_PATTERN.test(projectName)) {
    throw new InvalidProjectNameError(
      projectName,
      'name must contain only letters, digits, ".", "_" or "-"'
    );
  }
}
