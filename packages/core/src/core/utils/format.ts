// @file core/core/utils/format.ts

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

/**
 * 格式化文件大小
 * formatSize(1536) === '1.50 KB'
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} TB`;
}

export const PREVIEW_LENGTH = 100;

/**
 * 内容预览，超出部分以 ... 结尾
 */
export function previewContent(content: string, length = PREVIEW_LENGTH): string {
  return content.length > length ? `${content.slice(0, length)}...` : content;
}

/**
 * 时间戳格式化为 ISO 字符串
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}
