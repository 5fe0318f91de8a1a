// @file core/core/errors/TreeError.ts

/**
 * 错误码
 */
export enum ErrorCode {
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  NOT_FOUND = 'NOT_FOUND',
  WRONG_KIND = 'WRONG_KIND',
  ROOT_VIOLATION = 'ROOT_VIOLATION',
  INVALID_NAME = 'INVALID_NAME'
}

/**
 * 文件树错误基类
 * 所有引擎错误都可在调用处恢复，抛出前不会修改任何状态
 */
export class TreeError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;
  readonly timestamp: number;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'TreeError';
    this.code = code;
    this.details = details;
    this.timestamp = Date.now();

    // 保持原型链
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp
    };
  }

  static isTreeError(error: unknown): error is TreeError {
    return error instanceof TreeError;
  }
}

/** 同级目录下名称冲突 */
export class DuplicateNameError extends TreeError {
  constructor(readonly parentId: string, readonly conflictName: string) {
    super(ErrorCode.DUPLICATE_NAME, `Name already exists: ${conflictName}`, { parentId });
    this.name = 'DuplicateNameError';
  }
}

/** 路径或句柄无法定位 */
export class NotFoundError extends TreeError {
  constructor(readonly path: string, message = `Not found: ${path}`) {
    super(ErrorCode.NOT_FOUND, message, { path });
    this.name = 'NotFoundError';
  }
}

/** 对目录编辑内容，或对文件执行仅限目录的操作 */
export class WrongKindError extends TreeError {
  constructor(readonly nodeId: string, reason: string) {
    super(ErrorCode.WRONG_KIND, reason, { nodeId });
    this.name = 'WrongKindError';
  }
}

/** 删除或重命名根节点 */
export class RootViolationError extends TreeError {
  constructor(operation: string) {
    super(ErrorCode.ROOT_VIOLATION, `Cannot ${operation} the root directory`, { operation });
    this.name = 'RootViolationError';
  }
}

export class InvalidNameError extends TreeError {
  constructor(readonly invalidName: string) {
    super(ErrorCode.INVALID_NAME, `Invalid name: '${invalidName}'`);
    this.name = 'InvalidNameError';
  }
}

// 便捷工厂函数
export const Errors = {
  duplicateName: (parentId: string, name: string) => new DuplicateNameError(parentId, name),

  notFound: (path: string) => new NotFoundError(path),

  nodeNotFound: (nodeId: string) => new NotFoundError(nodeId, `Node not found: ${nodeId}`),

  notADirectory: (nodeId: string, name: string) =>
    new WrongKindError(nodeId, `Not a directory: ${name}`),

  notAFile: (nodeId: string, name: string) =>
    new WrongKindError(nodeId, `Not a file: ${name}`),

  rootViolation: (operation: string) => new RootViolationError(operation),

  invalidName: (name: string) => new InvalidNameError(name)
};
