import { join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Directory holding built-in templates, stub sources and project files.
 * Shipped next to src/ and dist/ so both resolve it the same way.
 */
export const assetsDir = fileURLToPath(new URL('../assets/', import.meta.url));

export function assetPath(...segments: string[]): string {
  return join(assetsDir, ...segments);
}
