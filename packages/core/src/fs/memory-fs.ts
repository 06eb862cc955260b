import { dirname, relative, resolve, sep } from 'path';
import { FilesystemError } from '../errors.js';
import type { ProjectFileSystem, WriteOptions } from './types.js';

/**
 * In-memory file entry
 */
interface MemoryFile {
  content: string;
  mode: number;
}

/**
 * InMemoryFileSystem - ProjectFileSystem that keeps everything in memory
 *
 * Useful for:
 * - Unit testing generation without touching the disk
 * - Dry runs that only report what would be written
 *
 * @example
 * ```typescript
 * const fileSystem = new InMemoryFileSystem();
 * const generator = new ProjectGenerator({ fileSystem, outputDir: '/work' });
 *
 * await generator.generate('demo');
 * console.log(await fileSystem.readFile('/work/demo/pipeline.yaml'));
 * ```
 */
export class InMemoryFileSystem implements ProjectFileSystem {
  private files: Map<string, MemoryFile> = new Map();
  private directories: Set<string> = new Set();
  private mutationCount = 0;

  async ensureDir(path: string): Promise<void> {
    const target = resolve(path);

    if (this.files.has(target)) {
      throw new FilesystemError(`Not a directory: ${target}`, { path: target, code: 'ENOTDIR' });
    }

    this.addDirectory(target);
  }

  async writeFile(path: string, content: string, options?: WriteOptions): Promise<void> {
    const target = resolve(path);

    if (this.directories.has(target)) {
      throw new FilesystemError(`Is a directory: ${target}`, { path: target, code: 'EISDIR' });
    }

    this.addDirectory(dirname(target));
    this.files.set(target, { content, mode: options?.executable ? 0o755 : 0o644 });
    this.mutationCount++;
  }

  async readFile(path: string): Promise<string> {
    const file = this.files.get(resolve(path));

    if (!file) {
      throw new FilesystemError(`File not found: ${path}`, { path, code: 'ENOENT' });
    }

    return file.content;
  }

  async exists(path: string): Promise<boolean> {
    const target = resolve(path);
    return this.files.has(target) || this.directories.has(target);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.directories.has(resolve(path));
  }

  async isExecutable(path: string): Promise<boolean> {
    const file = this.files.get(resolve(path));
    return file !== undefined && (file.mode & 0o111) !== 0;
  }

  async listFiles(dirPath: string): Promise<string[]> {
    const root = resolve(dirPath);

    return Array.from(this.files.keys())
      .filter((path) => path.startsWith(root + sep))
      .map((path) => relative(root, path).split(sep).join('/'))
      .sort();
  }

  /**
   * Immediate child directory names of a directory, sorted
   */
  listDirectories(dirPath: string): string[] {
    const root = resolve(dirPath);

    return Array.from(this.directories)
      .filter((path) => dirname(path) === root && path !== root)
      .map((path) => relative(root, path))
      .sort();
  }

  /**
   * Number of directory creations and file writes performed so far
   */
  get mutations(): number {
    return this.mutationCount;
  }

  /**
   * Clear all files and directories (useful for testing)
   */
  clear(): void {
    this.files.clear();
    this.directories.clear();
    this.mutationCount = 0;
  }

  private addDirectory(path: string): void {
    let current = path;

    while (!this.directories.has(current)) {
      this.directories.add(current);
      this.mutationCount++;

      const parent = dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }
}
