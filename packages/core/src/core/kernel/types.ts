// @file core/core/kernel/types.ts

export type NodeId = string;

/**
 * 节点类型
 */
export enum NodeKind {
  FILE = 'file',
  DIRECTORY = 'directory'
}

/**
 * 节点快照（只读）
 * 存储层内部的记录不会直接暴露给调用方
 */
export interface TreeNode {
  readonly id: NodeId;
  readonly parentId: NodeId | null;
  readonly name: string;
  readonly kind: NodeKind;
  /** 子节点句柄，按创建顺序；文件为空数组 */
  readonly children: readonly NodeId[];
  /** 文件内容；目录为 null */
  readonly content: string | null;
  /** 内容字节数；目录没有独立大小，为 null */
  readonly size: number | null;
  readonly createdAt: number;
  readonly modifiedAt: number;
}

/**
 * 属性面板数据
 */
export interface NodeStat {
  id: NodeId;
  name: string;
  kind: NodeKind;
  path: string;
  createdAt: number;
  modifiedAt: number;
  size: number | null;
  preview: string | null;
}

/**
 * 遍历项
 */
export interface WalkEntry {
  node: TreeNode;
  depth: number;
}

/**
 * 事件类型
 */
export enum TreeEventType {
  NODE_INSERTED = 'node:inserted',
  NODE_REMOVED = 'node:removed',
  NODE_RENAMED = 'node:renamed',
  CONTENT_CHANGED = 'node:content-changed'
}

interface BaseEvent<T extends TreeEventType> {
  type: T;
  nodeId: NodeId;
  /** 事件发生时节点的绝对路径 */
  path: string;
  timestamp: number;
}

export interface NodeInsertedEvent extends BaseEvent<TreeEventType.NODE_INSERTED> {
  parentId: NodeId;
  kind: NodeKind;
}

export interface NodeRemovedEvent extends BaseEvent<TreeEventType.NODE_REMOVED> {
  parentId: NodeId;
  kind: NodeKind;
}

export interface NodeRenamedEvent extends BaseEvent<TreeEventType.NODE_RENAMED> {
  oldName: string;
  newName: string;
}

export interface ContentChangedEvent extends BaseEvent<TreeEventType.CONTENT_CHANGED> {
  size: number;
}

export type TreeEvent =
  | NodeInsertedEvent
  | NodeRemovedEvent
  | NodeRenamedEvent
  | ContentChangedEvent;

/** 按类型取出事件结构 */
export type TreeEventOf<T extends TreeEventType> = Extract<TreeEvent, { type: T }>;
