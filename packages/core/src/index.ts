// @file packages/core/src/index.ts

export * from './core';

// ==================== Factory ====================
export { FileTree } from './factory/FileTree';
export type { FileTreeInstance } from './factory/FileTree';
export { createFileTree } from './factory/createFileTree';
export { resolveConfig, DEFAULT_HOME } from './factory/config';
export type { FileTreeConfig, ResolvedConfig } from './factory/config';
