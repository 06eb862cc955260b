import { readFileSync } from 'fs';
import { join } from 'path';
import Handlebars from 'handlebars';
import { assetPath } from '../assets.js';

type HandlebarsEnvironment = ReturnType<typeof Handlebars.create>;
type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

/**
 * Python str.title() on identifiers: "main_processor" -> "Main Processor"
 */
export function titleCase(value: string): string {
  return value
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * POSIX shell single-quoted word: `it's` -> `'it'\''s'`
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * TextRenderer - Renders generated files from Handlebars templates
 *
 * Each target language keeps its source in its own `.hbs` file under the
 * assets directory. Values that land inside a string literal go through the
 * `json` helper, which yields a double-quoted literal valid in Python,
 * JavaScript and Go. Shell words go through the `shell` helper instead.
 *
 * Templates compile in strict mode: a missing field in a plain `{{field}}`
 * expression throws instead of rendering an empty string. Helper arguments
 * are not checked.
 */
export class TextRenderer {
  private readonly handlebars: HandlebarsEnvironment = Handlebars.create();
  private readonly compiled = new Map<string, CompiledTemplate>();
  private readonly sources = new Map<string, string>();

  constructor(private readonly baseDir: string = assetPath()) {
    this.handlebars.registerHelper('json', (value: unknown) => JSON.stringify(value));
    this.handlebars.registerHelper('shell', (value: unknown) => shellQuote(String(value)));
    this.handlebars.registerHelper('titleCase', (value: unknown) => titleCase(String(value)));
    this.handlebars.registerHelper('join', (items: unknown, separator: unknown) =>
      Array.isArray(items) ? items.join(typeof separator === 'string' ? separator : ', ') : ''
    );
  }

  /**
   * Render a template file relative to the assets directory
   */
  render(templatePath: string, context: object): string {
    let template = this.compiled.get(templatePath);

    if (!template) {
      template = this.handlebars.compile(this.raw(templatePath), { noEscape: true, strict: true });
      this.compiled.set(templatePath, template);
    }

    return template(context);
  }

  /**
   * Contents of an asset file, unrendered
   */
  raw(filePath: string): string {
    let source = this.sources.get(filePath);

    if (source === undefined) {
      source = readFileSync(join(this.baseDir, filePath), 'utf-8');
      this.sources.set(filePath, source);
    }

    return source;
  }
}
