// @file core/core/kernel/NodeStore.ts

import {
  NodeKind,
  TreeEventType,
  type NodeId,
  type NodeRemovedEvent,
  type NodeStat,
  type TreeEvent,
  type TreeNode,
  type WalkEntry
} from './types';
import { TreeNodes, isValidName, type NodeRecord } from './TreeNode';
import type { EventBus } from './EventBus';
import { Errors } from '../errors/TreeError';
import { ROOT_ID, createIdGenerator, getContentSize } from '../utils/id';
import { previewContent } from '../utils/format';

export interface NodeStoreOptions {
  /** 事件总线（可选，不传则不发布事件） */
  events?: EventBus;
  /** 时钟，默认 Date.now */
  clock?: () => number;
}

/**
 * 树引擎
 * 独占节点的存在与链接关系；所有操作先校验后修改，失败时树保持原样。
 * 节点以句柄寻址，父子关系保存为句柄，子节点按创建顺序排列。
 */
export class NodeStore {
  private readonly nodes = new Map<NodeId, NodeRecord>();
  private readonly events?: EventBus;
  private readonly clock: () => number;
  private readonly nextId = createIdGenerator();

  constructor(options: NodeStoreOptions = {}) {
    this.events = options.events;
    this.clock = options.clock ?? Date.now;

    const root = TreeNodes.create({
      id: ROOT_ID,
      parentId: null,
      name: '',
      kind: NodeKind.DIRECTORY,
      now: this.clock()
    });
    this.nodes.set(root.id, root);
  }

  // ==================== 查询 ====================

  get rootId(): NodeId {
    return ROOT_ID;
  }

  get root(): TreeNode {
    return this.getNode(ROOT_ID);
  }

  /** 存活节点总数（含根） */
  get size(): number {
    return this.nodes.size;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  getNode(id: NodeId): TreeNode {
    return TreeNodes.snapshot(this.record(id));
  }

  /**
   * 按创建顺序列出子节点
   */
  listChildren(id: NodeId): TreeNode[] {
    const dir = this.directory(id);
    return dir.children.map(childId => TreeNodes.snapshot(this.record(childId)));
  }

  findChild(dirId: NodeId, name: string): TreeNode | null {
    const child = this.findChildRecord(this.directory(dirId), name);
    return child ? TreeNodes.snapshot(child) : null;
  }

  readContent(id: NodeId): string {
    return this.file(id).content ?? '';
  }

  /**
   * 节点在同级序列中的位置，根节点为 0
   */
  indexOf(id: NodeId): number {
    const node = this.record(id);
    if (node.parentId === null) return 0;
    return this.record(node.parentId).children.indexOf(id);
  }

  /**
   * 绝对路径，根为 '/'
   */
  pathOf(id: NodeId): string {
    const names: string[] = [];
    let node = this.record(id);
    while (node.parentId !== null) {
      names.push(node.name);
      node = this.record(node.parentId);
    }
    return '/' + names.reverse().join('/');
  }

  /**
   * 先序深度优先遍历，起点深度为 0
   */
  *walk(id: NodeId = ROOT_ID): Generator<WalkEntry> {
    const stack: Array<{ id: NodeId; depth: number }> = [{ id, depth: 0 }];
    this.record(id);

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const node = this.record(entry.id);
      yield { node: TreeNodes.snapshot(node), depth: entry.depth };
      // 逆序入栈以保持创建顺序
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ id: node.children[i], depth: entry.depth + 1 });
      }
    }
  }

  stat(id: NodeId): NodeStat {
    const node = this.record(id);
    return {
      id: node.id,
      name: node.name,
      kind: node.kind,
      path: this.pathOf(id),
      createdAt: node.createdAt,
      modifiedAt: node.modifiedAt,
      size: node.size,
      preview: node.content === null ? null : previewContent(node.content)
    };
  }

  // ==================== 修改 ====================

  /**
   * 在父目录末尾追加新节点
   */
  createNode(parentId: NodeId, name: string, kind: NodeKind, content?: string): TreeNode {
    const parent = this.directory(parentId);
    if (!isValidName(name)) {
      throw Errors.invalidName(name);
    }
    if (this.findChildRecord(parent, name)) {
      throw Errors.duplicateName(parentId, name);
    }

    const node = TreeNodes.create({
      id: this.nextId(),
      parentId,
      name,
      kind,
      content,
      now: this.clock()
    });
    this.nodes.set(node.id, node);
    parent.children.push(node.id);

    this.publish([
      {
        type: TreeEventType.NODE_INSERTED,
        nodeId: node.id,
        parentId,
        kind,
        path: this.pathOf(node.id),
        timestamp: this.clock()
      }
    ]);
    return TreeNodes.snapshot(node);
  }

  /**
   * 删除节点及其整棵子树（后序：叶子先于父节点）
   * 返回被删除的句柄，顺序与销毁顺序一致
   */
  deleteNode(id: NodeId): NodeId[] {
    const target = this.record(id);
    if (target.parentId === null) {
      throw Errors.rootViolation('delete');
    }

    const order = this.collectPostOrder(target);
    const timestamp = this.clock();
    // 路径必须在拆除前计算
    const removed = order.map((node): NodeRemovedEvent => ({
      type: TreeEventType.NODE_REMOVED,
      nodeId: node.id,
      parentId: node.parentId ?? ROOT_ID,
      kind: node.kind,
      path: this.pathOf(node.id),
      timestamp
    }));

    for (const node of order) {
      this.destroy(node);
    }

    this.publish(removed);
    return order.map(node => node.id);
  }

  renameNode(id: NodeId, newName: string): void {
    const node = this.record(id);
    if (node.parentId === null) {
      throw Errors.rootViolation('rename');
    }
    if (!isValidName(newName)) {
      throw Errors.invalidName(newName);
    }
    if (newName === node.name) return;

    const parent = this.record(node.parentId);
    const clash = this.findChildRecord(parent, newName);
    if (clash && clash.id !== id) {
      throw Errors.duplicateName(parent.id, newName);
    }

    const oldName = node.name;
    node.name = newName;
    this.touch(node);

    this.publish([
      {
        type: TreeEventType.NODE_RENAMED,
        nodeId: id,
        oldName,
        newName,
        path: this.pathOf(id),
        timestamp: this.clock()
      }
    ]);
  }

  /**
   * 替换文件内容，重新计算大小并推进修改时间
   */
  updateContent(id: NodeId, text: string): void {
    const node = this.file(id);
    const size = getContentSize(text);

    node.content = text;
    node.size = size;
    this.touch(node);

    this.publish([
      {
        type: TreeEventType.CONTENT_CHANGED,
        nodeId: id,
        size,
        path: this.pathOf(id),
        timestamp: this.clock()
      }
    ]);
  }

  // ==================== 私有方法 ====================

  private record(id: NodeId): NodeRecord {
    const node = this.nodes.get(id);
    if (!node) {
      throw Errors.nodeNotFound(id);
    }
    return node;
  }

  private directory(id: NodeId): NodeRecord {
    const node = this.record(id);
    if (!TreeNodes.isDirectory(node)) {
      throw Errors.notADirectory(id, node.name);
    }
    return node;
  }

  private file(id: NodeId): NodeRecord {
    const node = this.record(id);
    if (!TreeNodes.isFile(node)) {
      throw Errors.notAFile(id, node.name || '/');
    }
    return node;
  }

  private findChildRecord(dir: NodeRecord, name: string): NodeRecord | undefined {
    for (const childId of dir.children) {
      const child = this.record(childId);
      if (child.name === name) return child;
    }
    return undefined;
  }

  private collectPostOrder(node: NodeRecord, out: NodeRecord[] = []): NodeRecord[] {
    for (const childId of node.children) {
      this.collectPostOrder(this.record(childId), out);
    }
    out.push(node);
    return out;
  }

  /**
   * 从父序列中摘除并清空自身链接
   */
  private destroy(node: NodeRecord): void {
    if (node.parentId !== null) {
      const siblings = this.record(node.parentId).children;
      const index = siblings.indexOf(node.id);
      if (index >= 0) siblings.splice(index, 1);
    }
    this.nodes.delete(node.id);
    node.parentId = null;
    node.children = [];
  }

  /** modifiedAt 单调不减，且不早于 createdAt */
  private touch(node: NodeRecord): void {
    node.modifiedAt = Math.max(this.clock(), node.modifiedAt, node.createdAt);
  }

  private publish(events: TreeEvent[]): void {
    this.events?.emitBatch(events);
  }
}
