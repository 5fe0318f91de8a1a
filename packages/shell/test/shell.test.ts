/**
 * @file test/shell.test.ts
 * 命令解释器测试
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createFileTree, silentLogger, type FileTree } from '@memtree/core';
import { TreeShell, createShell, renderListing } from '../src';

describe('TreeShell', () => {
  let tree: FileTree;
  let shell: TreeShell;

  const run = (line: string) => shell.execute(line);

  beforeEach(() => {
    tree = createFileTree({ home: null, seed: false, clock: () => 0, logger: silentLogger });
    shell = new TreeShell(tree);
  });

  it('ignores empty lines', () => {
    expect(run('   ')).toEqual({ ok: true, output: [] });
  });

  it('shows the current directory in the prompt', () => {
    expect(shell.prompt).toBe('/> ');
    run('mkdir docs');
    run('cd docs');
    expect(shell.prompt).toBe('/docs> ');
  });

  it('lists directories and files with sizes', () => {
    run('mkdir docs');
    run('touch docs/a.txt');
    run('write docs/a.txt hi');

    expect(run('ls').output).toEqual(['d          - docs']);
    expect(run('ls docs').output).toEqual(['-     2.00 B a.txt']);
  });

  it('prints an indented tree', () => {
    run('mkdir docs');
    run('mkdir docs/sub');
    run('touch docs/a.txt');

    expect(run('tree').output).toEqual(['/', '  docs/', '    sub/', '    a.txt']);
  });

  it('navigates with cd, up, back and forward', () => {
    run('mkdir docs');
    expect(run('cd docs').output).toEqual(['/docs']);
    expect(run('up').output).toEqual(['/']);
    expect(run('back').output).toEqual(['/docs']);
    expect(run('forward').output).toEqual(['/']);
    expect(run('pwd').output).toEqual(['/']);
  });

  it('keeps inner whitespace when writing', () => {
    run('touch note.txt');
    run('write note.txt hello  world');
    expect(run('cat note.txt').output).toEqual(['hello  world']);
  });

  it('drops the whitespace run between the path and the text', () => {
    run('touch a.txt');
    run('write   a.txt  \t hi  there');
    expect(tree.cat('a.txt')).toBe('hi  there');
  });

  it('prints multi-line content line by line', () => {
    tree.touch('note.txt', 'one\ntwo');
    expect(run('cat note.txt').output).toEqual(['one', 'two']);
  });

  it('shows file properties', () => {
    run('touch a.txt');
    run('write a.txt hi');

    expect(run('stat a.txt').output).toEqual([
      'Name: a.txt',
      'Kind: file',
      'Path: /a.txt',
      'Created: 1970-01-01T00:00:00.000Z',
      'Modified: 1970-01-01T00:00:00.000Z',
      'Size: 2.00 B',
      'Preview: hi'
    ]);
    expect(run('stat /').output[0]).toBe('Name: /');
  });

  it('reports how many nodes were removed', () => {
    run('mkdir docs');
    run('touch docs/a.txt');
    expect(run('rm docs')).toEqual({ ok: true, output: ['removed 2 node(s)'] });
    expect(run('ls').output).toEqual([]);
  });

  it('turns engine errors into messages', () => {
    run('mkdir docs');

    expect(run('mkdir docs')).toEqual({ ok: false, output: ['error: Name already exists: docs'] });
    expect(run('rm /')).toEqual({ ok: false, output: ['error: Cannot delete the root directory'] });
    expect(run('cd nowhere')).toEqual({ ok: false, output: ['error: Not found: nowhere'] });
    expect(run('write docs x')).toEqual({ ok: false, output: ['error: Not a file: docs'] });
  });

  it('rejects unknown commands and missing arguments', () => {
    expect(run('frobnicate')).toEqual({ ok: false, output: ['error: unknown command: frobnicate'] });
    expect(run('mv a')).toEqual({ ok: false, output: ['usage: mv <path> <newName>'] });
    expect(run('toString').ok).toBe(false);
  });

  it('keeps a log of tree changes', () => {
    run('mkdir docs');
    run('touch docs/a.txt');
    run('mv docs/a.txt b.txt');
    run('write docs/b.txt abc');

    expect(run('events').output).toEqual([
      'node:inserted /docs',
      'node:inserted /docs/a.txt',
      'node:renamed /docs/b.txt (was a.txt)',
      'node:content-changed /docs/b.txt (3 bytes)'
    ]);
  });

  it('caps the change log', () => {
    const small = new TreeShell(createFileTree({ home: null, seed: false, logger: silentLogger }), {
      eventLogSize: 2
    });
    small.execute('mkdir a');
    small.execute('mkdir b');
    small.execute('mkdir c');
    expect(small.events.map(e => e.path)).toEqual(['/b', '/c']);
  });

  it('lists commands in help', () => {
    const output = run('help').output;
    expect(output).toContain('write <path> <text...>');
    expect(output).toHaveLength(16);
  });
});

describe('createShell', () => {
  it('starts in the seeded home directory', () => {
    const shell = createShell({ seed: true, logLevel: 'silent' });
    expect(shell.prompt).toBe('/Home> ');
  });

  it('starts at the root without seeding', () => {
    const shell = createShell({ seed: false, logLevel: 'silent' });
    expect(shell.prompt).toBe('/> ');
    expect(shell.execute('cd ~')).toEqual({ ok: false, output: ['error: Not found: ~'] });
  });
});

describe('renderListing', () => {
  it('renders nothing for an empty directory', () => {
    expect(renderListing([])).toEqual([]);
  });
});
