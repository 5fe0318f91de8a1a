// @file core/factory/config.ts

import { createConsoleLogger, type Logger, type LogLevel } from '../core/logging/Logger';

/**
 * 文件树配置
 */
export interface FileTreeConfig {
  /** home 锚点路径，'~' 展开为该目录；设为 null 则不配置锚点 */
  home?: string | null;
  /** 是否创建初始目录（home 路径上缺失的目录） */
  seed?: boolean;
  /** 时钟，默认 Date.now */
  clock?: () => number;
  /** 日志级别，仅在未传入 logger 时生效 */
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface ResolvedConfig {
  home: string | null;
  seed: boolean;
  clock: () => number;
  logger: Logger;
}

export const DEFAULT_HOME = '/Home';

export function resolveConfig(config: FileTreeConfig = {}): ResolvedConfig {
  return {
    home: config.home === undefined ? DEFAULT_HOME : config.home,
    seed: config.seed ?? true,
    clock: config.clock ?? Date.now,
    logger: config.logger ?? createConsoleLogger('[memtree]', config.logLevel ?? 'warn')
  };
}
