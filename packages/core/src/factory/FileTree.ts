// @file core/factory/FileTree.ts

import {
  NodeKind,
  type NodeId,
  type NodeStat,
  type TreeNode,
  type WalkEntry
} from '../core/kernel/types';
import { TreeNodes } from '../core/kernel/TreeNode';
import type { NodeStore } from '../core/kernel/NodeStore';
import type { EventBus } from '../core/kernel/EventBus';
import type { PathResolver } from '../core/kernel/PathResolver';
import type { NavigationController } from '../core/navigation/NavigationController';
import type { Logger } from '../core/logging/Logger';

/**
 * 文件树实例
 */
export interface FileTreeInstance {
  store: NodeStore;
  events: EventBus;
  resolver: PathResolver;
  navigation: NavigationController;
  logger: Logger;
}

/**
 * 文件树门面类
 * 提供以路径为参数的简化 API，相对路径基于当前目录解析
 */
export class FileTree {
  constructor(private readonly instance: FileTreeInstance) {}

  // ==================== 核心访问器 ====================

  get store(): NodeStore {
    return this.instance.store;
  }

  get events(): EventBus {
    return this.instance.events;
  }

  get resolver(): PathResolver {
    return this.instance.resolver;
  }

  get navigation(): NavigationController {
    return this.instance.navigation;
  }

  private get log(): Logger {
    return this.instance.logger;
  }

  // ==================== 查询 ====================

  resolve(path: string): TreeNode {
    return this.resolver.resolve(path, this.navigation.getState().current);
  }

  pwd(): string {
    return this.store.pathOf(this.navigation.getState().current);
  }

  /**
   * 列出目录内容；路径指向文件时返回该文件本身
   */
  ls(path = '.'): TreeNode[] {
    const node = this.resolve(path);
    return TreeNodes.isDirectory(node) ? this.store.listChildren(node.id) : [node];
  }

  cat(path: string): string {
    return this.store.readContent(this.resolve(path).id);
  }

  stat(path: string): NodeStat {
    return this.store.stat(this.resolve(path).id);
  }

  tree(path = '.'): WalkEntry[] {
    return [...this.store.walk(this.resolve(path).id)];
  }

  // ==================== 导航 ====================

  cd(path: string): TreeNode {
    const target = this.resolve(path);
    this.navigation.navigateTo(target.id);
    return target;
  }

  back(): TreeNode {
    this.navigation.back();
    return this.navigation.current;
  }

  forward(): TreeNode {
    this.navigation.forward();
    return this.navigation.current;
  }

  up(): TreeNode {
    this.navigation.up();
    return this.navigation.current;
  }

  // ==================== 修改 ====================

  mkdir(path: string): TreeNode {
    return this.createAt(path, NodeKind.DIRECTORY);
  }

  touch(path: string, content = ''): TreeNode {
    return this.createAt(path, NodeKind.FILE, content);
  }

  /**
   * 删除节点（目录连同整棵子树）
   */
  rm(path: string): NodeId[] {
    const target = this.resolve(path);
    const removed = this.store.deleteNode(target.id);
    this.log.debug(`Removed ${path} (${removed.length} node(s))`);
    return removed;
  }

  /**
   * 重命名（不支持跨目录移动）
   */
  mv(path: string, newName: string): TreeNode {
    const target = this.resolve(path);
    this.store.renameNode(target.id, newName);
    this.log.debug(`Renamed ${path} -> ${newName}`);
    return this.store.getNode(target.id);
  }

  write(path: string, text: string): TreeNode {
    const target = this.resolve(path);
    this.store.updateContent(target.id, text);
    this.log.debug(`Wrote ${text.length} char(s) to ${path}`);
    return this.store.getNode(target.id);
  }

  /**
   * 释放订阅
   */
  dispose(): void {
    this.navigation.dispose();
    this.events.clear();
  }

  // ==================== 私有方法 ====================

  /**
   * 按路径创建：父路径必须已存在，不会自动创建中间目录
   */
  private createAt(path: string, kind: NodeKind, content?: string): TreeNode {
    const { parent, name } = this.resolver.split(path);
    const parentNode = this.resolve(parent);
    const node = this.store.createNode(parentNode.id, name, kind, content);
    this.log.debug(`Created ${kind} ${this.store.pathOf(node.id)}`);
    return node;
  }
}
