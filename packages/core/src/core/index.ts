// @file core/core/index.ts

// ==================== Kernel ====================
export { NodeStore } from './kernel/NodeStore';
export type { NodeStoreOptions } from './kernel/NodeStore';
export { TreeNodes, isValidName } from './kernel/TreeNode';
export { EventBus } from './kernel/EventBus';
export { PathResolver, HOME_SEGMENT } from './kernel/PathResolver';
export type { PathResolverOptions, SplitPath } from './kernel/PathResolver';
export {
  NodeKind,
  TreeEventType,
  type NodeId,
  type TreeNode,
  type NodeStat,
  type WalkEntry,
  type TreeEvent,
  type TreeEventOf,
  type NodeInsertedEvent,
  type NodeRemovedEvent,
  type NodeRenamedEvent,
  type ContentChangedEvent
} from './kernel/types';

// ==================== Navigation ====================
export { NavigationController } from './navigation/NavigationController';
export type { NavigationState } from './navigation/NavigationController';

// ==================== Errors ====================
export {
  TreeError,
  ErrorCode,
  Errors,
  DuplicateNameError,
  NotFoundError,
  WrongKindError,
  RootViolationError,
  InvalidNameError
} from './errors/TreeError';

// ==================== Logging ====================
export { createConsoleLogger, silentLogger } from './logging/Logger';
export type { Logger, LogLevel } from './logging/Logger';

// ==================== Utils ====================
export { ROOT_ID, getContentSize } from './utils/id';
export { formatSize, formatTimestamp, previewContent, PREVIEW_LENGTH } from './utils/format';
