import { access, chmod, mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { dirname, join } from 'path';
import { FilesystemError } from '../errors.js';
import type { ProjectFileSystem, WriteOptions } from './types.js';

/**
 * NodeFileSystem - ProjectFileSystem backed by the local disk
 */
export class NodeFileSystem implements ProjectFileSystem {
  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async writeFile(path: string, content: string, options?: WriteOptions): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');

    if (options?.executable) {
      await chmod(path, 0o755);
    }
  }

  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FilesystemError(`File not found: ${path}`, { path, code: 'ENOENT', cause: error });
      }
      throw error;
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  async isExecutable(path: string): Promise<boolean> {
    try {
      const stats = await stat(path);
      return stats.isFile() && (stats.mode & 0o111) !== 0;
    } catch {
      return false;
    }
  }

  async listFiles(dirPath: string): Promise<string[]> {
    if (!(await this.isDirectory(dirPath))) {
      return [];
    }

    const files: string[] = [];

    const walk = async (relative: string): Promise<void> => {
      const entries = await readdir(join(dirPath, relative), { withFileTypes: true });

      for (const entry of entries) {
        const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
          await walk(entryPath);
        } else if (entry.isFile()) {
          files.push(entryPath);
        }
      }
    };

    await walk('');
    return files.sort();
  }
}
