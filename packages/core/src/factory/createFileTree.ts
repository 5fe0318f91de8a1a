// @file core/factory/createFileTree.ts

import { NodeKind, type NodeId } from '../core/kernel/types';
import { TreeNodes } from '../core/kernel/TreeNode';
import { NodeStore } from '../core/kernel/NodeStore';
import { EventBus } from '../core/kernel/EventBus';
import { PathResolver } from '../core/kernel/PathResolver';
import { NavigationController } from '../core/navigation/NavigationController';
import { FileTree } from './FileTree';
import { resolveConfig, type FileTreeConfig, type ResolvedConfig } from './config';

/**
 * 创建文件树实例
 */
export function createFileTree(config: FileTreeConfig = {}): FileTree {
  const resolved = resolveConfig(config);
  const { logger, clock } = resolved;

  // 1. 事件总线与存储
  const events = new EventBus(logger);
  const store = new NodeStore({ events, clock });

  // 2. 路径解析器（home 锚点在初始目录创建后确定）
  const resolver = new PathResolver(store);
  const homeId = setupHome(store, resolver, resolved);
  resolver.setHome(homeId, homeId === null ? null : store.pathOf(homeId));

  // 3. 导航，从 home 开始
  const navigation = new NavigationController(store, events, homeId ?? store.rootId);

  logger.info(
    homeId ? `File tree ready, home at ${store.pathOf(homeId)}` : 'File tree ready, no home directory'
  );

  return new FileTree({ store, events, resolver, navigation, logger });
}

/**
 * 确定 home 锚点；seed 开启时逐级创建缺失目录
 */
function setupHome(store: NodeStore, resolver: PathResolver, config: ResolvedConfig): NodeId | null {
  if (config.home === null) return null;

  const segments = resolver.normalize(config.home).split('/').filter(Boolean);
  let current = store.rootId;

  for (const segment of segments) {
    const existing = store.findChild(current, segment);
    if (existing) {
      if (!TreeNodes.isDirectory(existing)) {
        config.logger.warn(`Home path is not a directory: ${config.home}`);
        return null;
      }
      current = existing.id;
      continue;
    }
    if (!config.seed) {
      config.logger.warn(`Home directory not found: ${config.home}`);
      return null;
    }
    current = store.createNode(current, segment, NodeKind.DIRECTORY).id;
  }

  return current;
}
