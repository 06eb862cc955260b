import type { ProjectFileSystem } from '@pipegen/core';

/**
 * Where command output goes
 */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

/**
 * Everything a command reads from its surroundings
 */
export interface CliContext {
  /** Defaults to the local disk */
  fileSystem?: ProjectFileSystem;
  output: CliOutput;
  env: Record<string, string | undefined>;
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};
