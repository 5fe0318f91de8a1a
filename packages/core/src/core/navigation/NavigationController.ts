// @file core/core/navigation/NavigationController.ts

import { produce } from 'immer';
import { TreeEventType, type NodeId, type TreeNode } from '../kernel/types';
import { TreeNodes } from '../kernel/TreeNode';
import type { NodeStore } from '../kernel/NodeStore';
import type { EventBus } from '../kernel/EventBus';
import { Errors } from '../errors/TreeError';

export interface NavigationState {
  current: NodeId;
  /** 后退栈，栈顶在末尾 */
  history: NodeId[];
  /** 前进栈，栈顶在末尾 */
  future: NodeId[];
}

type Listener = (state: NavigationState) => void;

/**
 * 导航控制器
 * 维护当前目录与前进/后退历史。状态不可变，每次转移产生新快照。
 * 节点删除后通过总线的 removed 事件清理失效句柄；
 * 未接总线时，每次读取或转移前先清理。
 */
export class NavigationController {
  private state: NavigationState;
  private listeners = new Set<Listener>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly store: NodeStore,
    events?: EventBus,
    start: NodeId = store.rootId
  ) {
    this.assertDirectory(start);
    this.state = { current: start, history: [], future: [] };
    if (events) {
      this.unsubscribe = events.on(TreeEventType.NODE_REMOVED, () => this.scrub());
    }
  }

  getState(): NavigationState {
    this.scrub();
    return this.state;
  }

  get current(): TreeNode {
    return this.store.getNode(this.getState().current);
  }

  get canGoBack(): boolean {
    return this.getState().history.length > 0;
  }

  get canGoForward(): boolean {
    return this.getState().future.length > 0;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ==================== 状态转移 ====================

  /**
   * 直接导航：当前位置入后退栈，清空前进栈
   */
  navigateTo(id: NodeId): void {
    this.scrub();
    this.assertDirectory(id);
    this.commit(draft => {
      draft.history.push(draft.current);
      draft.future = [];
      draft.current = id;
    });
  }

  back(): void {
    if (!this.canGoBack) return;
    this.commit(draft => {
      const previous = draft.history.pop();
      if (previous === undefined) return;
      draft.future.push(draft.current);
      draft.current = previous;
    });
  }

  forward(): void {
    if (!this.canGoForward) return;
    this.commit(draft => {
      const next = draft.future.pop();
      if (next === undefined) return;
      draft.history.push(draft.current);
      draft.current = next;
    });
  }

  up(): void {
    const parentId = this.current.parentId;
    if (parentId !== null) {
      this.navigateTo(parentId);
    }
  }

  /**
   * 回到根目录并清空历史
   */
  reset(): void {
    this.commit(draft => {
      draft.current = this.store.rootId;
      draft.history = [];
      draft.future = [];
    });
  }

  /**
   * 移除已删除节点的句柄；当前目录被删除时回到根
   */
  scrub(): void {
    const live = (id: NodeId) => this.store.has(id);
    const { current, history, future } = this.state;
    if (live(current) && history.every(live) && future.every(live)) return;

    this.commit(draft => {
      draft.history = draft.history.filter(live);
      draft.future = draft.future.filter(live);
      if (!live(draft.current)) {
        draft.current = this.store.rootId;
      }
    });
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.listeners.clear();
  }

  // ==================== 私有方法 ====================

  private commit(recipe: (draft: NavigationState) => void): void {
    const next = produce(this.state, recipe);
    if (next === this.state) return;
    this.state = next;
    this.listeners.forEach(listener => listener(next));
  }

  private assertDirectory(id: NodeId): void {
    const node = this.store.getNode(id);
    if (!TreeNodes.isDirectory(node)) {
      throw Errors.notADirectory(id, node.name);
    }
  }
}
