import type { StubContext, StubFile, StubKind, StubSynthesizer } from './types.js';

/**
 * Placeholder directory processors/<id>_wasm/ holding only a README.
 * No WebAssembly source is generated.
 */
export class WasmPlaceholderSynthesizer implements StubSynthesizer {
  readonly type = 'rust_wasm';
  readonly kind: StubKind = 'portable';
  readonly description = 'Rust/WebAssembly module (placeholder only)';

  synthesize({ processor, renderer }: StubContext): StubFile[] {
    return [
      {
        path: `processors/${processor.id}_wasm/README.md`,
        content: renderer.render('stubs/wasm-readme.md.hbs', { processor }),
      },
    ];
  }
}
