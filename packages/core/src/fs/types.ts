export interface WriteOptions {
  /** Mark the file executable (0o755) */
  executable?: boolean;
}

/**
 * ProjectFileSystem - Where generated projects are written and validated
 *
 * Implementations:
 * - NodeFileSystem - The local disk (fs/promises)
 * - InMemoryFileSystem - Tests and dry runs
 *
 * All paths are absolute.
 */
export interface ProjectFileSystem {
  /**
   * Create a directory and its missing parents. Existing directories are not an error.
   */
  ensureDir(path: string): Promise<void>;

  /**
   * Write (or overwrite) a text file, creating parent directories
   */
  writeFile(path: string, content: string, options?: WriteOptions): Promise<void>;

  /**
   * Read a text file
   *
   * @throws FilesystemError (code ENOENT) if the file doesn't exist
   */
  readFile(path: string): Promise<string>;

  exists(path: string): Promise<boolean>;

  isDirectory(path: string): Promise<boolean>;

  isExecutable(path: string): Promise<boolean>;

  /**
   * Files below a directory, recursively, as sorted '/'-separated relative paths.
   * Returns [] when the directory doesn't exist.
   */
  listFiles(dirPath: string): Promise<string[]>;
}
