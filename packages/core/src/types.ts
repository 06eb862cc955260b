/**
 * Core types for the pipegen generation engine
 */

import type { TemplateRegistry } from './templates/registry.js';
import type { SynthesizerRegistry } from './stubs/registry.js';
import type { ProjectFileSystem } from './fs/types.js';

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Generator Configuration
// ============================================================================

export interface GeneratorConfig {
  /** Directory the project directory is created in (default: process.cwd()) */
  outputDir?: string;
  /** Template set to resolve names against (default: built-in templates) */
  registry?: TemplateRegistry;
  /** Processor type dispatch table (default: python, node, go, rust_wasm) */
  synthesizers?: SynthesizerRegistry;
  /** Where files are written (default: NodeFileSystem) */
  fileSystem?: ProjectFileSystem;
  /** Fail on processor types without a synthesizer instead of skipping them */
  strict?: boolean;
  logLevel?: LogLevel;
  logger?: Logger;
  clock?: () => Date;
}

// ============================================================================
// Generation Types
// ============================================================================

export type GenerationStep =
  | 'directories'
  | 'descriptor'
  | 'processors'
  | 'container'
  | 'scripts'
  | 'dependencies'
  | 'documentation';

export const GENERATION_STEPS: readonly GenerationStep[] = [
  'directories',
  'descriptor',
  'processors',
  'container',
  'scripts',
  'dependencies',
  'documentation',
];

export interface SkippedProcessor {
  id: string;
  type: string;
}

export interface GenerationResult {
  projectName: string;
  projectPath: string;
  template: string;
  /** Project-relative paths of every file written, in write order */
  files: string[];
  skippedProcessors: SkippedProcessor[];
  nextSteps: string[];
  generatedAt: Date;
  duration: number;
}

export type GeneratorEvents = {
  'step:start': (step: GenerationStep) => void;
  'step:complete': (step: GenerationStep, files: string[]) => void;
  'processor:skipped': (processor: SkippedProcessor) => void;
  complete: (result: GenerationResult) => void;
};
