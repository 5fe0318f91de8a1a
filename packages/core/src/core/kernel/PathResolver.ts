// @file core/core/kernel/PathResolver.ts

import type { NodeId, TreeNode } from './types';
import { TreeNodes } from './TreeNode';
import type { NodeStore } from './NodeStore';
import { Errors, NotFoundError } from '../errors/TreeError';

export const HOME_SEGMENT = '~';

export interface PathResolverOptions {
  /** home 锚点；未配置时 '~' 按普通名称处理 */
  home?: NodeId | null;
  /** home 的绝对路径；锚点被删除后按此路径重新定位 */
  homePath?: string | null;
}

/**
 * 路径拆分结果
 */
export interface SplitPath {
  /** 父路径；单段相对路径时为 '.' */
  parent: string;
  name: string;
}

/**
 * 路径解析器
 * 把 '/' 分隔的字符串解析为节点，只读，不修改树
 */
export class PathResolver {
  private home: NodeId | null;
  private homePath: string | null;

  constructor(
    private readonly store: NodeStore,
    options: PathResolverOptions = {}
  ) {
    this.home = options.home ?? null;
    this.homePath = options.homePath ?? null;
  }

  get homeId(): NodeId | null {
    return this.home;
  }

  setHome(id: NodeId | null, path: string | null = null): void {
    this.home = id;
    this.homePath = path;
  }

  /**
   * 解析路径
   * 以 '/' 开头从根开始，否则从 from（默认根）开始；
   * '~' 仅作为首段时展开为 home 锚点。
   */
  resolve(path: string, from: NodeId = this.store.rootId): TreeNode {
    const absolute = path.startsWith('/');
    const segments = path.split('/').filter(Boolean);
    let current: NodeId = absolute ? this.store.rootId : from;

    // 起点本身必须存在
    if (!this.store.has(current)) {
      throw Errors.notFound(path);
    }

    for (let i = 0; i < segments.length; i++) {
      current = this.step(current, segments[i], i === 0 && !absolute, path);
    }

    return this.store.getNode(current);
  }

  /**
   * 解析路径，不存在时返回 null
   */
  tryResolve(path: string, from?: NodeId): TreeNode | null {
    try {
      return this.resolve(path, from);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private step(current: NodeId, segment: string, leading: boolean, path: string): NodeId {
    if (segment === '.') return current;

    if (segment === '..') {
      return this.store.getNode(current).parentId ?? current;
    }

    if (segment === HOME_SEGMENT && leading && this.home !== null) {
      return this.locateHome(this.home, path);
    }

    const node = this.store.getNode(current);
    if (!TreeNodes.isDirectory(node)) {
      throw Errors.notFound(path);
    }
    const child = this.store.findChild(current, segment);
    if (!child) {
      throw Errors.notFound(path);
    }
    return child.id;
  }

  /**
   * 锚点失效时按 home 路径重新定位，找到同路径的目录则更新锚点
   */
  private locateHome(home: NodeId, path: string): NodeId {
    if (this.store.has(home)) return home;

    const relocated = this.homePath === null ? null : this.tryResolve(this.homePath);
    if (!relocated || !TreeNodes.isDirectory(relocated)) {
      throw new NotFoundError(path, `Home directory no longer exists: ${path}`);
    }
    this.home = relocated.id;
    return relocated.id;
  }

  // ==================== 纯字符串工具 ====================

  /**
   * 标准化绝对路径
   * 移除多余斜杠，处理 . 和 ..
   */
  normalize(path: string): string {
    const normalized: string[] = [];
    for (const part of path.split('/')) {
      if (!part || part === '.') continue;
      if (part === '..') {
        normalized.pop();
      } else {
        normalized.push(part);
      }
    }
    return '/' + normalized.join('/');
  }

  join(...segments: string[]): string {
    return this.normalize(segments.join('/'));
  }

  basename(path: string): string {
    const normalized = this.normalize(path);
    return normalized.slice(normalized.lastIndexOf('/') + 1);
  }

  dirname(path: string): string {
    const normalized = this.normalize(path);
    const lastSlash = normalized.lastIndexOf('/');
    return lastSlash <= 0 ? '/' : normalized.slice(0, lastSlash);
  }

  /**
   * 拆分为父路径和末段名称，用于按路径创建
   * 'a/b/c' -> { parent: 'a/b', name: 'c' }
   * '/c'    -> { parent: '/', name: 'c' }
   * 'c'     -> { parent: '.', name: 'c' }
   */
  split(path: string): SplitPath {
    const trimmed = path.replace(/\/+$/, '');
    const lastSlash = trimmed.lastIndexOf('/');
    if (lastSlash < 0) {
      return { parent: '.', name: trimmed };
    }
    return {
      parent: lastSlash === 0 ? '/' : trimmed.slice(0, lastSlash),
      name: trimmed.slice(lastSlash + 1)
    };
  }
}
