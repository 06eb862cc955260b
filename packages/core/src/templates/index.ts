/**
 * Template System - project template schema, parsing, registry and built-in set
 */

export {
  ProjectTemplateSchema,
  TriggerSchema,
  ProcessorSchema,
  OutputSchema,
  TemplateValidationError,
  type ProjectTemplate,
  type TriggerRecord,
  type ProcessorRecord,
  type OutputRecord,
} from './schema.js';

export {
  parseTemplate,
  validateTemplate,
  getTemplateSummary,
  listProcessorTypes,
  findHttpTrigger,
  DEFAULT_HTTP_PORT,
  type TemplateSummary,
} from './parser.js';

export { findDependencyCycle, type DependencyNode } from './graph.js';

export { TemplateRegistry, TemplateNotFoundError } from './registry.js';

export {
  loadBuiltinTemplates,
  createBuiltinRegistry,
  BUILTIN_TEMPLATE_NAMES,
  DEFAULT_TEMPLATE,
  type BuiltinTemplateName,
} from './builtin.js';
