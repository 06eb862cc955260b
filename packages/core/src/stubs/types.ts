import type { TextRenderer } from '../rendering/renderer.js';
import type { ProcessorRecord } from '../templates/schema.js';

/**
 * How a processor type is realized on disk
 *
 * - interpreted: one executable script
 * - compiled: a module directory with an entry source and a build manifest
 * - portable: a placeholder directory, no working source
 */
export type StubKind = 'interpreted' | 'compiled' | 'portable';

/**
 * One generated file, path relative to the project root
 */
export interface StubFile {
  path: string;
  content: string;
  executable?: boolean;
}

export interface StubContext {
  projectName: string;
  processor: ProcessorRecord;
  renderer: TextRenderer;
}

/**
 * StubSynthesizer - Code generation strategy for one processor type tag
 *
 * @example
 * ```typescript
 * const registry = createDefaultSynthesizers();
 * registry.register({
 *   type: 'ruby',
 *   kind: 'interpreted',
 *   description: 'Ruby script',
 *   synthesize: ({ processor }) => [
 *     { path: `processors/${processor.id}.rb`, content: '...', executable: true },
 *   ],
 * });
 * ```
 */
export interface StubSynthesizer {
  readonly type: string;
  readonly kind: StubKind;
  readonly description: string;
  synthesize(context: StubContext): StubFile[];
}
