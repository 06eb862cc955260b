import type { StubContext, StubFile, StubKind, StubSynthesizer } from './types.js';

export interface InterpretedScriptOptions {
  type: string;
  description: string;
  /** File extension without the dot */
  extension: string;
  /** Handlebars template, relative to the assets directory */
  template: string;
}

/**
 * Single executable script at processors/<id>.<extension>
 */
export class InterpretedScriptSynthesizer implements StubSynthesizer {
  readonly kind: StubKind = 'interpreted';
  readonly type: string;
  readonly description: string;
  private readonly extension: string;
  private readonly template: string;

  constructor(options: InterpretedScriptOptions) {
    this.type = options.type;
    this.description = options.description;
    this.extension = options.extension;
    this.template = options.template;
  }

  synthesize({ processor, renderer }: StubContext): StubFile[] {
    return [
      {
        path: `processors/${processor.id}.${this.extension}`,
        content: renderer.render(this.template, { processor }),
        executable: true,
      },
    ];
  }
}

export const pythonSynthesizer = new InterpretedScriptSynthesizer({
  type: 'python',
  description: 'Python 3 script (stdin/stdout JSON)',
  extension: 'py',
  template: 'stubs/python.py.hbs',
});

export const nodeSynthesizer = new InterpretedScriptSynthesizer({
  type: 'node',
  description: 'Node.js script (stdin/stdout JSON)',
  extension: 'js',
  template: 'stubs/node.js.hbs',
});
