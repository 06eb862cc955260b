import { GenerationError } from '../errors.js';
import { getTemplateSummary, validateTemplate } from './parser.js';
import type { TemplateSummary } from './parser.js';
import type { ProjectTemplate } from './schema.js';

/**
 * Custom error for template not found
 */
export class TemplateNotFoundError extends GenerationError {
  public readonly templateName: string;

  constructor(templateName: string, available: string[] = []) {
    const hint = available.length > 0 ? ` (available: ${available.join(', ')})` : '';
    super(`Template not found: ${templateName}${hint}`);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
  }
}

/**
 * Template Registry - Read-only store of project templates
 *
 * Every template is validated and frozen when the registry is constructed;
 * nothing is registered or replaced afterwards.
 *
 * @example
 * ```typescript
 * const registry = new TemplateRegistry([basic, security]);
 * const template = registry.lookup('basic');
 * ```
 */
export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, ProjectTemplate>;

  /**
   * @param templates - Template definitions (validated against the template schema)
   * @throws TemplateValidationError if a template is invalid
   * @throws Error if two templates share a name
   */
  constructor(templates: readonly ProjectTemplate[]) {
    const entries = new Map<string, ProjectTemplate>();

    for (const candidate of templates) {
      const template = validateTemplate(candidate);

      if (entries.has(template.name)) {
        throw new Error(`Template with name '${template.name}' is already registered`);
      }

      entries.set(template.name, deepFreeze(template));
    }

    this.templates = entries;
  }

  /**
   * Get a template by name
   *
   * @param name - Template name to retrieve
   * @returns Template definition
   * @throws TemplateNotFoundError if template not found
   */
  lookup(name: string): ProjectTemplate {
    const template = this.templates.get(name);

    if (!template) {
      throw new TemplateNotFoundError(name, this.listNames());
    }

    return template;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * List all templates in registration order
   */
  list(): ProjectTemplate[] {
    return Array.from(this.templates.values());
  }

  listNames(): string[] {
    return Array.from(this.templates.keys());
  }

  listSummaries(): TemplateSummary[] {
    return this.list().map(getTemplateSummary);
  }

  get size(): number {
    return this.templates.size;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
