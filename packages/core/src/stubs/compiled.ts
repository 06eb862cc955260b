import type { StubContext, StubFile, StubKind, StubSynthesizer } from './types.js';

export const GO_TOOLCHAIN_VERSION = '1.21';

/**
 * Go module at processors/<id>/ with main.go and go.mod
 */
export class GoModuleSynthesizer implements StubSynthesizer {
  readonly type = 'go';
  readonly kind: StubKind = 'compiled';
  readonly description = `Go ${GO_TOOLCHAIN_VERSION} module (stdin/stdout JSON)`;

  synthesize({ projectName, processor, renderer }: StubContext): StubFile[] {
    const dir = `processors/${processor.id}`;

    return [
      {
        path: `${dir}/main.go`,
        content: renderer.render('stubs/go/main.go.hbs', { processor }),
      },
      {
        path: `${dir}/go.mod`,
        content: renderer.render('stubs/go/go.mod.hbs', {
          moduleName: `${projectName}/${dir}`,
          goVersion: GO_TOOLCHAIN_VERSION,
        }),
      },
    ];
  }
}
