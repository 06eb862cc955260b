/**
 * File System Adapters - where generated projects are written
 */

export type { ProjectFileSystem, WriteOptions } from './types.js';
export { NodeFileSystem } from './node-fs.js';
export { InMemoryFileSystem } from './memory-fs.js';
