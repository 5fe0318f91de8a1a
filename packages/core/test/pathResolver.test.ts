/**
 * @file test/pathResolver.test.ts
 * 路径解析测试
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NodeStore, PathResolver, NodeKind, NotFoundError, type TreeNode } from '../src';

describe('PathResolver', () => {
  let store: NodeStore;
  let resolver: PathResolver;
  let docs: TreeNode;
  let file: TreeNode;
  let sub: TreeNode;
  let home: TreeNode;

  beforeEach(() => {
    store = new NodeStore({ clock: () => 0 });
    docs = store.createNode(store.rootId, 'docs', NodeKind.DIRECTORY);
    file = store.createNode(docs.id, 'a.txt', NodeKind.FILE, 'hi');
    sub = store.createNode(docs.id, 'sub', NodeKind.DIRECTORY);
    home = store.createNode(store.rootId, 'Home', NodeKind.DIRECTORY);
    resolver = new PathResolver(store, { home: home.id });
  });

  describe('resolve', () => {
    it('resolves an absolute path to the node', () => {
      const node = resolver.resolve('/docs/a.txt');
      expect(node.id).toBe(file.id);
      expect(node.size).toBe(2);
    });

    it('treats /a/b/.. like /a', () => {
      expect(resolver.resolve('/docs/sub/..').id).toBe(resolver.resolve('/docs').id);
    });

    it('ignores empty segments', () => {
      expect(resolver.resolve('//docs///a.txt/').id).toBe(file.id);
      expect(resolver.resolve('/').id).toBe(store.rootId);
      expect(resolver.resolve('').id).toBe(store.rootId);
    });

    it('resolves relative paths from the given node', () => {
      expect(resolver.resolve('a.txt', docs.id).id).toBe(file.id);
      expect(resolver.resolve('.', sub.id).id).toBe(sub.id);
      expect(resolver.resolve('../a.txt', sub.id).id).toBe(file.id);
      expect(resolver.resolve('./sub/./..', docs.id).id).toBe(docs.id);
    });

    it('ignores the start node for absolute paths', () => {
      expect(resolver.resolve('/docs', sub.id).id).toBe(docs.id);
    });

    it('stays at the root on .. from the root', () => {
      expect(resolver.resolve('/..').id).toBe(store.rootId);
      expect(resolver.resolve('../../docs').id).toBe(docs.id);
    });

    it('expands a leading ~ to the home anchor', () => {
      store.createNode(home.id, 'notes.txt', NodeKind.FILE);
      expect(resolver.resolve('~').id).toBe(home.id);
      expect(resolver.resolve('~/notes.txt', docs.id).name).toBe('notes.txt');
      expect(resolver.resolve('~/..').id).toBe(store.rootId);
    });

    it('treats ~ as a plain name when it is not the leading segment', () => {
      expect(() => resolver.resolve('/~')).toThrow(NotFoundError);
      const literal = store.createNode(docs.id, '~', NodeKind.DIRECTORY);
      expect(resolver.resolve('/docs/~').id).toBe(literal.id);
    });

    it('treats ~ as a plain name when no home is configured', () => {
      const plain = new PathResolver(store);
      expect(() => plain.resolve('~')).toThrow(NotFoundError);

      const literal = store.createNode(store.rootId, '~', NodeKind.DIRECTORY);
      expect(plain.resolve('~').id).toBe(literal.id);
      expect(plain.homeId).toBeNull();
    });

    it('fails once the home anchor is deleted', () => {
      store.deleteNode(home.id);
      expect(() => resolver.resolve('~')).toThrow('Home directory no longer exists: ~');
    });

    it('follows the home path once the anchor is recreated', () => {
      const anchored = new PathResolver(store, { home: home.id, homePath: '/Home' });
      store.deleteNode(home.id);
      expect(() => anchored.resolve('~')).toThrow('Home directory no longer exists: ~');

      const recreated = store.createNode(store.rootId, 'Home', NodeKind.DIRECTORY);

      expect(anchored.resolve('~').id).toBe(recreated.id);
      expect(anchored.homeId).toBe(recreated.id);
    });

    it('does not treat a file at the home path as home', () => {
      const anchored = new PathResolver(store, { home: home.id, homePath: '/Home' });
      store.deleteNode(home.id);
      store.createNode(store.rootId, 'Home', NodeKind.FILE);

      expect(() => anchored.resolve('~/x')).toThrow('Home directory no longer exists: ~/x');
    });

    it('reports the requested path on failure', () => {
      let caught: unknown;
      try {
        resolver.resolve('/docs/missing/a.txt');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NotFoundError);
      expect(caught instanceof NotFoundError && caught.path).toBe('/docs/missing/a.txt');
    });

    it('does not descend through a file', () => {
      expect(() => resolver.resolve('/docs/a.txt/x')).toThrow(NotFoundError);
    });

    it('fails when the start node no longer exists', () => {
      store.deleteNode(sub.id);
      expect(() => resolver.resolve('.', sub.id)).toThrow(NotFoundError);
    });

    it('returns null from tryResolve when missing', () => {
      expect(resolver.tryResolve('/nope')).toBeNull();
      expect(resolver.tryResolve('/docs')?.id).toBe(docs.id);
    });
  });

  describe('string helpers', () => {
    it('normalizes paths', () => {
      expect(resolver.normalize('a//b/./c/..')).toBe('/a/b');
      expect(resolver.normalize('/../..')).toBe('/');
    });

    it('joins, basename and dirname', () => {
      expect(resolver.join('/a', 'b/', '../c')).toBe('/a/c');
      expect(resolver.basename('/a/b.txt')).toBe('b.txt');
      expect(resolver.basename('/')).toBe('');
      expect(resolver.dirname('/a/b.txt')).toBe('/a');
      expect(resolver.dirname('/a')).toBe('/');
    });

    it('splits a path into parent and name', () => {
      expect(resolver.split('a/b/c')).toEqual({ parent: 'a/b', name: 'c' });
      expect(resolver.split('/c')).toEqual({ parent: '/', name: 'c' });
      expect(resolver.split('c')).toEqual({ parent: '.', name: 'c' });
      expect(resolver.split('a/b/')).toEqual({ parent: 'a', name: 'b' });
    });
  });
});
