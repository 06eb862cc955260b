import { UnsupportedProcessorTypeError } from '../errors.js';
import type { StubContext, StubFile, StubSynthesizer } from './types.js';

export interface SynthesizeOptions {
  /** Throw UnsupportedProcessorTypeError instead of returning null for unknown types */
  strict?: boolean;
}

/**
 * Synthesizer Registry - Dispatch table from processor type tag to strategy
 *
 * Each type maps to exactly one synthesizer. Supporting a new language is a
 * register() call; existing strategies are untouched.
 */
export class SynthesizerRegistry {
  private synthesizers: Map<string, StubSynthesizer> = new Map();

  constructor(synthesizers: readonly StubSynthesizer[] = []) {
    for (const synthesizer of synthesizers) {
      this.register(synthesizer);
    }
  }

  /**
   * Register a synthesizer
   *
   * @throws Error if the type is already registered
   */
  register(synthesizer: StubSynthesizer): void {
    if (this.synthesizers.has(synthesizer.type)) {
      throw new Error(`Synthesizer for type '${synthesizer.type}' is already registered`);
    }

    this.synthesizers.set(synthesizer.type, synthesizer);
  }

  get(type: string): StubSynthesizer | undefined {
    return this.synthesizers.get(type);
  }

  has(type: string): boolean {
    return this.synthesizers.has(type);
  }

  list(): StubSynthesizer[] {
    return Array.from(this.synthesizers.values());
  }

  listTypes(): string[] {
    return Array.from(this.synthesizers.keys());
  }

  /**
   * Produce the stub files for one processor
   *
   * @returns Files to write, or null when the type is unknown and not strict
   * @throws UnsupportedProcessorTypeError for unknown types in strict mode
   */
  synthesize(context: StubContext, options: SynthesizeOptions = {}): StubFile[] | null {
    const { processor } = context;
    const synthesizer = this.synthesizers.get(processor.type);

    if (!synthesizer) {
      if (options.strict) {
        throw new UnsupportedProcessorTypeError(processor.id, processor.type, this.listTypes());
      }
      return null;
    }

    return synthesizer.synthesize(context);
  }
}
