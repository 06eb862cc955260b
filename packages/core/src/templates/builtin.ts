import { readFileSync } from 'fs';
import { join } from 'path';
import { assetPath } from '../assets.js';
import { parseTemplate } from './parser.js';
import { TemplateRegistry } from './registry.js';
import { TemplateValidationError } from './schema.js';
import type { ProjectTemplate } from './schema.js';

export const BUILTIN_TEMPLATE_NAMES = ['basic', 'security', 'iot'] as const;

export type BuiltinTemplateName = (typeof BUILTIN_TEMPLATE_NAMES)[number];

export const DEFAULT_TEMPLATE: BuiltinTemplateName = 'basic';

/**
 * Load the templates shipped with the package
 *
 * Read synchronously so a registry is complete as soon as it is constructed.
 *
 * @param dirPath - Directory containing `<name>.yaml` for every built-in name
 * @throws TemplateValidationError if a file is invalid or its name does not match
 */
export function loadBuiltinTemplates(dirPath: string = assetPath('templates')): ProjectTemplate[] {
  return BUILTIN_TEMPLATE_NAMES.map((name) => {
    const template = parseTemplate(readFileSync(join(dirPath, `${name}.yaml`), 'utf-8'));

    if (template.name !== name) {
      throw new TemplateValidationError(
        `Template file ${name}.yaml declares name '${template.name}'`
      );
    }

    return template;
  });
}

/**
 * Registry over the built-in templates
 */
export function createBuiltinRegistry(dirPath?: string): TemplateRegistry {
  return new TemplateRegistry(loadBuiltinTemplates(dirPath));
}
