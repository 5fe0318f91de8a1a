// @file core/core/kernel/TreeNode.ts

import { NodeKind, type NodeId, type TreeNode } from './types';
import { getContentSize } from '../utils/id';

/**
 * 存储层内部记录（可变）
 */
export interface NodeRecord {
  id: NodeId;
  parentId: NodeId | null;
  name: string;
  kind: NodeKind;
  children: NodeId[];
  content: string | null;
  size: number | null;
  createdAt: number;
  modifiedAt: number;
}

interface NodeCreateInput {
  id: NodeId;
  parentId: NodeId | null;
  name: string;
  kind: NodeKind;
  content?: string;
  now: number;
}

/**
 * 节点工厂与工具方法
 */
export const TreeNodes = {
  create(input: NodeCreateInput): NodeRecord {
    const isFile = input.kind === NodeKind.FILE;
    const content = isFile ? input.content ?? '' : null;

    return {
      id: input.id,
      parentId: input.parentId,
      name: input.name,
      kind: input.kind,
      children: [],
      content,
      size: content === null ? null : getContentSize(content),
      createdAt: input.now,
      modifiedAt: input.now
    };
  },

  /**
   * 生成只读快照
   */
  snapshot(record: NodeRecord): TreeNode {
    return Object.freeze({
      ...record,
      children: Object.freeze([...record.children])
    });
  },

  isDirectory(node: Pick<TreeNode, 'kind'>): boolean {
    return node.kind === NodeKind.DIRECTORY;
  },

  isFile(node: Pick<TreeNode, 'kind'>): boolean {
    return node.kind === NodeKind.FILE;
  }
} as const;

/**
 * 名称校验：非空，不含 '/'，且不能是 '.' 或 '..'
 */
export function isValidName(name: string): boolean {
  return name.length > 0 && !name.includes('/') && name !== '.' && name !== '..';
}
