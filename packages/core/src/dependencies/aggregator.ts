import type { ProjectTemplate } from '../templates/schema.js';

export const REQUIREMENTS_FILENAME = 'requirements.txt';

/**
 * Packages the generated python stubs and runner need in every project
 */
export const BASELINE_PYTHON_PACKAGES: readonly string[] = ['pyyaml>=6.0', 'requests>=2.31.0'];

/**
 * apt packages installed in every container image
 */
export const BASELINE_SYSTEM_PACKAGES: readonly string[] = ['curl', 'build-essential'];

const BASELINES: Readonly<Record<string, readonly string[]>> = {
  python: BASELINE_PYTHON_PACKAGES,
  system: BASELINE_SYSTEM_PACKAGES,
};

/**
 * Baseline packages followed by the template's list for one ecosystem
 *
 * Entries are kept verbatim and in order. Duplicates are not removed, so a
 * package listed twice (or also in the baseline) appears twice.
 *
 * Only the `python` and `system` lists reach generated files. `go` and `rust`
 * entries stay queryable here but are not written: they carry no versions,
 * and a go.mod `require` line needs one.
 */
export function aggregateDependencies(template: ProjectTemplate, ecosystem = 'python'): string[] {
  return [...(BASELINES[ecosystem] ?? []), ...(template.dependencies[ecosystem] ?? [])];
}

/**
 * requirements.txt contents: one package per line
 */
export function renderRequirements(template: ProjectTemplate): string {
  return `${aggregateDependencies(template, 'python').join('\n')}\n`;
}

export function systemPackages(template: ProjectTemplate): string[] {
  return aggregateDependencies(template, 'system');
}
