// @file packages/shell/src/index.ts

export { TreeShell } from './TreeShell';
export type { ShellResult, TreeShellOptions } from './TreeShell';
export { renderListing, renderTree, renderStat, renderEvent } from './render';
export { createProgram, createShell } from './program';
