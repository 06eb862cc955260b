/**
 * Processor stub synthesis - one strategy per processor type tag
 */

import { GoModuleSynthesizer } from './compiled.js';
import { nodeSynthesizer, pythonSynthesizer } from './interpreted.js';
import { WasmPlaceholderSynthesizer } from './portable.js';
import { SynthesizerRegistry } from './registry.js';

export type { StubKind, StubFile, StubContext, StubSynthesizer } from './types.js';
export { SynthesizerRegistry, type SynthesizeOptions } from './registry.js';
export {
  InterpretedScriptSynthesizer,
  pythonSynthesizer,
  nodeSynthesizer,
  type InterpretedScriptOptions,
} from './interpreted.js';
export { GoModuleSynthesizer, GO_TOOLCHAIN_VERSION } from './compiled.js';
export { WasmPlaceholderSynthesizer } from './portable.js';

/**
 * Registry with the built-in types: python, node, go, rust_wasm
 */
export function createDefaultSynthesizers(): SynthesizerRegistry {
  return new SynthesizerRegistry([
    pythonSynthesizer,
    nodeSynthesizer,
    new GoModuleSynthesizer(),
    new WasmPlaceholderSynthesizer(),
  ]);
}
