// @file core/core/utils/id.ts

export const ROOT_ID = 'root';

/**
 * 生成节点句柄
 * 每个 NodeStore 持有独立的序列，句柄在删除后不会被复用
 */
export function createIdGenerator(prefix = 'node'): () => string {
  let seq = 0;
  return () => `${prefix}_${(++seq).toString(36)}`;
}

const encoder = new TextEncoder();

/**
 * 计算内容大小（UTF-8 字节数）
 */
export function getContentSize(content: string): number {
  return encoder.encode(content).byteLength;
}
