// @file shell/program.ts

import { createInterface as createReadline } from 'node:readline';
import { Command, Option } from 'commander';
import { createConsoleLogger, createFileTree, type LogLevel } from '@memtree/core';
import { TreeShell } from './TreeShell';

type GlobalOptions = {
  home?: string;
  seed: boolean;
  logLevel: LogLevel;
};

const EXIT_COMMANDS = new Set(['exit', 'quit']);

/**
 * 按命令行选项创建 shell
 */
export function createShell(options: GlobalOptions): TreeShell {
  const logger = createConsoleLogger('[memtree]', options.logLevel);
  // 关闭初始目录时，除非显式指定，否则不配置 home
  const home = options.home ?? (options.seed ? undefined : null);
  const tree = createFileTree({ home, seed: options.seed, logger });
  return new TreeShell(tree, { logger });
}

function runRepl(shell: TreeShell): Promise<void> {
  const rl = createReadline({ input: process.stdin, output: process.stdout });

  return new Promise(resolve => {
    rl.setPrompt(shell.prompt);
    rl.prompt();

    rl.on('line', line => {
      if (EXIT_COMMANDS.has(line.trim())) {
        rl.close();
        return;
      }
      const result = shell.execute(line);
      for (const text of result.output) {
        (result.ok ? console.log : console.error)(text);
      }
      rl.setPrompt(shell.prompt);
      rl.prompt();
    });

    rl.on('close', () => {
      shell.dispose();
      resolve();
    });
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('memtree')
    .description('Browse and edit an in-memory file tree')
    .option('--home <path>', 'directory that ~ expands to')
    .option('--no-seed', 'start with an empty tree')
    .addOption(
      new Option('--log-level <level>', 'log verbosity')
        .choices(['debug', 'info', 'warn', 'error', 'silent'])
        .default('warn')
    )
    .action(async () => {
      const shell = createShell(program.opts<GlobalOptions>());
      await runRepl(shell);
    });

  return program;
}
