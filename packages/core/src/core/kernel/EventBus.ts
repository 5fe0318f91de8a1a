// @file core/core/kernel/EventBus.ts

import type { TreeEvent, TreeEventOf, TreeEventType } from './types';
import type { Logger } from '../logging/Logger';
import { silentLogger } from '../logging/Logger';

type EventHandler<T extends TreeEventType> = (event: TreeEventOf<T>) => void;
type AnyHandler = (event: TreeEvent) => void;

/**
 * 变更通知总线
 * 同步派发，处理器抛出的异常只记录日志，不影响其他订阅者
 */
export class EventBus {
  // 原处理器 -> 带类型守卫的包装
  private handlers = new Map<TreeEventType, Map<unknown, AnyHandler>>();
  private wildcardHandlers = new Set<AnyHandler>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * 订阅特定类型事件
   */
  on<T extends TreeEventType>(type: T, handler: EventHandler<T>): () => void {
    let registered = this.handlers.get(type);
    if (!registered) {
      registered = new Map();
      this.handlers.set(type, registered);
    }
    registered.set(handler, event => {
      if (isEventOf(event, type)) handler(event);
    });
    return () => this.off(type, handler);
  }

  /**
   * 订阅所有事件
   */
  onAny(handler: AnyHandler): () => void {
    this.wildcardHandlers.add(handler);
    return () => this.offAny(handler);
  }

  /**
   * 取消订阅
   */
  off<T extends TreeEventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  offAny(handler: AnyHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * 发布事件
   */
  emit(event: TreeEvent): void {
    // 先复制，处理器内取消订阅不影响本次派发
    for (const handler of [...(this.handlers.get(event.type)?.values() ?? [])]) {
      this.safeCall(handler, event);
    }
    for (const handler of [...this.wildcardHandlers]) {
      this.safeCall(handler, event);
    }
  }

  /**
   * 按顺序发布一批事件
   */
  emitBatch(events: readonly TreeEvent[]): void {
    for (const event of events) {
      this.emit(event);
    }
  }

  /**
   * 清空所有订阅
   */
  clear(): void {
    this.handlers.clear();
    this.wildcardHandlers.clear();
  }

  get listenerCount(): number {
    let count = this.wildcardHandlers.size;
    for (const registered of this.handlers.values()) count += registered.size;
    return count;
  }

  private safeCall(handler: AnyHandler, event: TreeEvent): void {
    try {
      handler(event);
    } catch (e) {
      this.logger.error(`[EventBus] Handler error for ${event.type}:`, e);
    }
  }
}

function isEventOf<T extends TreeEventType>(event: TreeEvent, type: T): event is TreeEventOf<T> {
  return event.type === type;
}
