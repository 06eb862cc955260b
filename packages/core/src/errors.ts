import type { GenerationStep } from './types.js';

/**
 * Base class for every failure surfaced by ProjectGenerator.generate()
 */
export class GenerationError extends Error {
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'GenerationError';
    this.cause = cause;
  }
}

/**
 * Project name is not usable as a single directory name
 */
export class InvalidProjectNameError extends GenerationError {
  public readonly projectName: string;

  constructor(projectName: string, reason: string) {
    super(`Invalid project name '${projectName}': ${reason}`);
    this.name = 'InvalidProjectNameError';
    this.projectName = projectName;
  }
}

export interface FilesystemErrorDetails {
  path: string;
  step?: GenerationStep;
  projectPath?: string;
  code?: string;
  cause?: unknown;
}

/**
 * Directory or file operation failed. Generation stops at the failing step and
 * leaves whatever was already written in place.
 */
export class FilesystemError extends GenerationError {
  public readonly path: string;
  public readonly step?: GenerationStep;
  public readonly projectPath?: string;
  public readonly code?: string;

  constructor(message: string, details: FilesystemErrorDetails) {
    super(message, details.cause);
    this.name = 'FilesystemError';
    this.path = details.path;
    this.step = details.step;
    this.projectPath = details.projectPath;
    this.code = details.code;
  }

  /**
   * Wrap a raw error thrown while running a generation step
   */
  static fromStep(
    step: GenerationStep,
    projectPath: string,
    error: unknown
  ): FilesystemError {
    const path = error instanceof FilesystemError ? error.path : errorPath(error) ?? projectPath;
    const code = error instanceof FilesystemError ? error.code : errorCode(error);
    const reason = error instanceof Error ? error.message : String(error);

    return new FilesystemError(`Step '${step}' failed for ${projectPath}: ${reason}`, {
      path,
      step,
      projectPath,
      code,
      cause: error,
    });
  }
}

/**
 * Processor type has no registered synthesizer (raised in strict mode only)
 */
export class UnsupportedProcessorTypeError extends GenerationError {
  public readonly processorId: string;
  public readonly processorType: string;

  constructor(processorId: string, processorType: string, knownTypes: string[]) {
    super(
      `Processor '${processorId}' has unsupported type '${processorType}'. Known types: ${knownTypes.join(', ')}`
    );
    this.name = 'UnsupportedProcessorTypeError';
    this.processorId = processorId;
    this.processorType = processorType;
  }
}

/**
 * Environment or flag configuration could not be parsed
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * errno-style code (ENOENT, EACCES...) of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorPath(error: unknown): string | undefined {
  if (error instanceof Error && 'path' in error && typeof error.path === 'string') {
    return error.path;
  }
  return undefined;
}
