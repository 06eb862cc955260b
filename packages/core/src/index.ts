/**
 * Pipegen Core
 *
 * Scaffolds data-processing pipeline projects from declarative templates
 */

export { ProjectGenerator, PROJECT_DIRECTORIES, validateProjectName } from './generator.js';
export {
  GenerationError,
  InvalidProjectNameError,
  FilesystemError,
  UnsupportedProcessorTypeError,
  ConfigError,
  type FilesystemErrorDetails,
} from './errors.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export { configFromEnv, type EnvConfig } from './config.js';
export { assetsDir, assetPath } from './assets.js';
export { TextRenderer, titleCase } from './rendering/renderer.js';
export {
  validateProject,
  type CheckStatus,
  type ValidationCheck,
  type ValidationReport,
} from './validator.js';

export { LOG_LEVELS, GENERATION_STEPS } from './types.js';
export type {
  LogLevel,
  Logger,
  GeneratorConfig,
  GenerationStep,
  GenerationResult,
  GeneratorEvents,
  SkippedProcessor,
} from './types.js';

// Export template system
export * from './templates/index.js';

// Export processor stub synthesis
export * from './stubs/index.js';

// Export file system adapters
export * from './fs/index.js';

// Export generated artifacts
export {
  buildPipelineDescriptor,
  serializePipeline,
  PipelineDescriptorSchema,
  PIPELINE_SETTINGS,
  DESCRIPTOR_FILENAME,
  DESCRIPTOR_VERSION,
  type PipelineDescriptor,
} from './descriptor/serializer.js';
export {
  aggregateDependencies,
  renderRequirements,
  systemPackages,
  REQUIREMENTS_FILENAME,
  BASELINE_PYTHON_PACKAGES,
  BASELINE_SYSTEM_PACKAGES,
} from './dependencies/aggregator.js';
export * from './container/index.js';
export { renderDevScript, DEV_COMMANDS, DEV_SCRIPT_PATH, type DevCommand } from './scaffold/dev-script.js';
export {
  renderReadme,
  buildNextSteps,
  pipelineTestCommand,
  README_FILENAME,
  GITIGNORE_FILENAME,
} from './scaffold/readme.js';
