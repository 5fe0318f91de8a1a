// @file shell/render.ts

import {
  NodeKind,
  TreeEventType,
  formatSize,
  formatTimestamp,
  type NodeStat,
  type TreeEvent,
  type TreeNode,
  type WalkEntry
} from '@memtree/core';

const SIZE_COLUMN = 10;

function displayName(node: Pick<TreeNode, 'name'>): string {
  return node.name === '' ? '/' : node.name;
}

/**
 * 目录列表，每行：类型标记 大小 名称
 *   d          - docs
 *   -     2.00 B a.txt
 */
export function renderListing(nodes: readonly TreeNode[]): string[] {
  return nodes.map(node => {
    const isDir = node.kind === NodeKind.DIRECTORY;
    const size = isDir || node.size === null ? '-' : formatSize(node.size);
    return `${isDir ? 'd' : '-'} ${size.padStart(SIZE_COLUMN)} ${node.name}`;
  });
}

/**
 * 缩进树，目录名以 '/' 结尾
 */
export function renderTree(entries: readonly WalkEntry[]): string[] {
  return entries.map(({ node, depth }) => {
    const name = displayName(node);
    const suffix = node.kind === NodeKind.DIRECTORY && name !== '/' ? '/' : '';
    return `${'  '.repeat(depth)}${name}${suffix}`;
  });
}

export function renderStat(stat: NodeStat): string[] {
  const lines = [
    `Name: ${displayName(stat)}`,
    `Kind: ${stat.kind}`,
    `Path: ${stat.path}`,
    `Created: ${formatTimestamp(stat.createdAt)}`,
    `Modified: ${formatTimestamp(stat.modifiedAt)}`
  ];
  if (stat.kind === NodeKind.FILE) {
    lines.push(`Size: ${formatSize(stat.size ?? 0)}`);
    lines.push(`Preview: ${stat.preview ?? ''}`);
  }
  return lines;
}

export function renderEvent(event: TreeEvent): string {
  switch (event.type) {
    case TreeEventType.NODE_INSERTED:
    case TreeEventType.NODE_REMOVED:
      return `${event.type} ${event.path}`;
    case TreeEventType.NODE_RENAMED:
      return `${event.type} ${event.path} (was ${event.oldName})`;
    case TreeEventType.CONTENT_CHANGED:
      return `${event.type} ${event.path} (${event.size} bytes)`;
  }
}
