// @file shell/TreeShell.ts

import { TreeError, silentLogger, type FileTree, type Logger, type TreeEvent } from '@memtree/core';
import { renderEvent, renderListing, renderStat, renderTree } from './render';

export interface ShellResult {
  ok: boolean;
  output: string[];
}

export interface TreeShellOptions {
  logger?: Logger;
  /** 变更记录保留条数 */
  eventLogSize?: number;
}

interface CommandSpec {
  usage: string;
  /** 最少参数个数 */
  minArgs: number;
  run(args: string[], line: string): string[];
}

/**
 * 文本命令解释器
 * 表现层：不持有树状态，只调用门面 API 并订阅变更事件
 */
export class TreeShell {
  private readonly commands: Map<string, CommandSpec>;
  private readonly eventLog: TreeEvent[] = [];
  private readonly eventLogSize: number;
  private readonly log: Logger;
  private readonly unsubscribe: () => void;

  constructor(private readonly tree: FileTree, options: TreeShellOptions = {}) {
    this.log = options.logger ?? silentLogger;
    this.eventLogSize = options.eventLogSize ?? 50;
    this.unsubscribe = tree.events.onAny(event => this.record(event));
    this.commands = new Map(Object.entries(this.createCommands()));
  }

  /**
   * 当前目录提示符
   */
  get prompt(): string {
    return `${this.tree.pwd()}> `;
  }

  execute(line: string): ShellResult {
    const args = tokenize(line);
    const name = args.shift();
    if (name === undefined) {
      return { ok: true, output: [] };
    }

    const command = this.commands.get(name);
    if (!command) {
      return { ok: false, output: [`error: unknown command: ${name}`] };
    }
    if (args.length < command.minArgs) {
      return { ok: false, output: [`usage: ${command.usage}`] };
    }

    try {
      return { ok: true, output: command.run(args, line) };
    } catch (error) {
      if (TreeError.isTreeError(error)) {
        this.log.debug(`Command failed: ${line}`, error.code);
        return { ok: false, output: [`error: ${error.message}`] };
      }
      throw error;
    }
  }

  /**
   * 已记录的变更事件（旧的在前）
   */
  get events(): readonly TreeEvent[] {
    return this.eventLog;
  }

  dispose(): void {
    this.unsubscribe();
  }

  private record(event: TreeEvent): void {
    this.eventLog.push(event);
    if (this.eventLog.length > this.eventLogSize) {
      this.eventLog.splice(0, this.eventLog.length - this.eventLogSize);
    }
  }

  private createCommands(): Record<string, CommandSpec> {
    const tree = this.tree;
    const cwd = () => [tree.pwd()];

    return {
      pwd: { usage: 'pwd', minArgs: 0, run: cwd },
      ls: { usage: 'ls [path]', minArgs: 0, run: ([path]) => renderListing(tree.ls(path)) },
      cd: {
        usage: 'cd <path>',
        minArgs: 1,
        run: ([path]) => {
          tree.cd(path);
          return cwd();
        }
      },
      back: {
        usage: 'back',
        minArgs: 0,
        run: () => {
          tree.back();
          return cwd();
        }
      },
      forward: {
        usage: 'forward',
        minArgs: 0,
        run: () => {
          tree.forward();
          return cwd();
        }
      },
      up: {
        usage: 'up',
        minArgs: 0,
        run: () => {
          tree.up();
          return cwd();
        }
      },
      mkdir: {
        usage: 'mkdir <path>',
        minArgs: 1,
        run: ([path]) => {
          tree.mkdir(path);
          return [];
        }
      },
      touch: {
        usage: 'touch <path>',
        minArgs: 1,
        run: ([path]) => {
          tree.touch(path);
          return [];
        }
      },
      rm: {
        usage: 'rm <path>',
        minArgs: 1,
        run: ([path]) => [`removed ${tree.rm(path).length} node(s)`]
      },
      mv: {
        usage: 'mv <path> <newName>',
        minArgs: 2,
        run: ([path, newName]) => {
          tree.mv(path, newName);
          return [];
        }
      },
      cat: { usage: 'cat <path>', minArgs: 1, run: ([path]) => tree.cat(path).split('\n') },
      write: {
        usage: 'write <path> <text...>',
        minArgs: 1,
        run: ([path], line) => {
          tree.write(path, remainder(line, 2));
          return [];
        }
      },
      tree: { usage: 'tree [path]', minArgs: 0, run: ([path]) => renderTree(tree.tree(path)) },
      stat: { usage: 'stat <path>', minArgs: 1, run: ([path]) => renderStat(tree.stat(path)) },
      events: { usage: 'events', minArgs: 0, run: () => this.eventLog.map(renderEvent) },
      help: {
        usage: 'help',
        minArgs: 0,
        run: () => [...this.commands.values()].map(spec => spec.usage)
      }
    };
  }
}

function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

/**
 * 去掉前 count 个词及其后的空白，余下原文的内部空白保持不变
 */
function remainder(line: string, count: number): string {
  let rest = line.trimStart();
  for (let i = 0; i < count; i++) {
    rest = rest.replace(/^\S+\s*/, '');
  }
  return rest;
}
