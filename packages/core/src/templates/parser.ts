import { parse as parseYaml } from 'yaml';
import { ProjectTemplateSchema, TemplateValidationError } from './schema.js';
import type { ProjectTemplate, TriggerRecord } from './schema.js';

/**
 * Parse YAML template content and validate against schema
 *
 * @param yamlContent - Raw YAML template content
 * @returns Validated ProjectTemplate
 * @throws TemplateValidationError if validation fails
 *
 * @example
 * ```typescript
 * const template = parseTemplate(await readFile('basic.yaml', 'utf-8'));
 * console.log(template.processors[0].id); // 'main_processor'
 * ```
 */
export function parseTemplate(yamlContent: string): ProjectTemplate {
  let parsed: unknown;

  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    if (error instanceof Error) {
      throw new TemplateValidationError(`Failed to parse YAML template: ${error.message}`);
    }
    throw new TemplateValidationError('Unknown error parsing template');
  }

  if (!parsed) {
    throw new TemplateValidationError('Template file is empty or contains only comments');
  }

  return validateTemplate(parsed);
}

/**
 * Validate a template object (already parsed)
 *
 * Zod rebuilds objects with schema keys first; record keys are put back in the
 * order the template author wrote them so the descriptor stays diffable.
 *
 * @param templateObj - Template object to validate
 * @returns Validated ProjectTemplate
 * @throws TemplateValidationError if validation fails
 */
export function validateTemplate(templateObj: unknown): ProjectTemplate {
  const result = ProjectTemplateSchema.safeParse(templateObj);

  if (!result.success) {
    throw new TemplateValidationError('Template validation failed', result.error);
  }

  const template = result.data;

  if (isRecord(templateObj)) {
    alignRecords(template.triggers, templateObj.triggers);
    alignRecords(template.processors, templateObj.processors);
    alignRecords(template.outputs, templateObj.outputs);
  }

  return template;
}

/**
 * Get template metadata summary
 *
 * @param template - Template to summarize
 * @returns Summary object
 */
export function getTemplateSummary(template: ProjectTemplate) {
  return {
    name: template.name,
    description: template.description,
    triggerCount: template.triggers.length,
    processorCount: template.processors.length,
    outputCount: template.outputs.length,
    processorTypes: listProcessorTypes(template),
    dockerServices: [...template.docker_services],
  };
}

export type TemplateSummary = ReturnType<typeof getTemplateSummary>;

/**
 * Distinct processor types in declaration order
 */
export function listProcessorTypes(template: ProjectTemplate): string[] {
  return Array.from(new Set(template.processors.map((processor) => processor.type)));
}

/**
 * First enabled HTTP trigger, with its port and path narrowed
 */
export function findHttpTrigger(
  template: ProjectTemplate
): { trigger: TriggerRecord; port: number; path: string } | undefined {
  const trigger = template.triggers.find((t) => t.type === 'http' && t.enabled);
  if (!trigger) return undefined;

  return {
    trigger,
    port: typeof trigger.port === 'number' ? trigger.port : DEFAULT_HTTP_PORT,
    path: typeof trigger.path === 'string' ? trigger.path : '/',
  };
}

export const DEFAULT_HTTP_PORT = 8080;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function alignRecords(records: object[], source: unknown): void {
  if (!Array.isArray(source)) return;

  records.forEach((record, index) => {
    const original: unknown = source[index];
    if (isRecord(original)) {
      restoreKeyOrder(record, original);
    }
  });
}

/**
 * Re-insert keys of `target` in the order they appear in `source`
 */
function restoreKeyOrder(target: object, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    if (!Object.prototype.hasOwnProperty.call(target, key)) continue;

    const value: unknown = Reflect.get(target, key);
    Reflect.deleteProperty(target, key);
    Reflect.set(target, key, value);
  }
}
