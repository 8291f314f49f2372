/**
 * Tests for siftUp / siftDown / isHeapOrdered.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NodeArena } from '../../src/tree/node-arena.js';
import { isHeapOrdered, siftDown, siftUp } from '../../src/tree/sift.js';
import type { NodeRef } from '../../src/tree/types.js';

describe('sift', () => {
  let arena: NodeArena;

  beforeEach(() => {
    arena = new NodeArena({ maxChildren: 2 });
  });

  describe('siftUp', () => {
    it('moves a small leaf value to the root', () => {
      const root = arena.createRoot(1);
      const left = arena.attachChild(root, 3);
      arena.attachChild(root, 5);
      arena.attachChild(left, 4);
      const leaf = arena.attachChild(left, 0);

      const rest = siftUp(arena, leaf);

      expect(rest).toEqual(root);
      expect(arena.value(root)).toBe(0);
      expect(arena.childValues(root)).toEqual([1, 5]);
      expect(arena.childValues(left)).toEqual([4, 3]);
      expect(isHeapOrdered(arena, root)).toBe(true);
    });

    it('stops at a parent with an equal value', () => {
      const root = arena.createRoot(2);
      const child = arena.attachChild(root, 2);

      expect(siftUp(arena, child)).toEqual(child);
      expect(arena.value(root)).toBe(2);
    });

    it('returns a root unchanged', () => {
      const root = arena.createRoot(7);

      expect(siftUp(arena, root)).toEqual(root);
    });
  });

  describe('siftDown', () => {
    it('moves a large root value toward the leaves', () => {
      const root = arena.createRoot(9);
      const left = arena.attachChild(root, 2);
      arena.attachChild(root, 6);
      const leftLeft = arena.attachChild(left, 5);
      arena.attachChild(left, 7);

      const rest = siftDown(arena, root);

      expect(rest).toEqual(leftLeft);
      expect(arena.value(root)).toBe(2);
      expect(arena.childValues(root)).toEqual([5, 6]);
      expect(arena.childValues(left)).toEqual([9, 7]);
      expect(isHeapOrdered(arena, root)).toBe(true);
    });

    it('prefers the first child on ties', () => {
      const root = arena.createRoot(5);
      const first = arena.attachChild(root, 1);
      arena.attachChild(root, 1);

      expect(siftDown(arena, root)).toEqual(first);
      expect(arena.childValues(root)).toEqual([5, 1]);
    });

    it('returns a leaf unchanged', () => {
      const root = arena.createRoot(1);
      const leaf = arena.attachChild(root, 3);

      expect(siftDown(arena, leaf)).toEqual(leaf);
      expect(arena.value(leaf)).toBe(3);
    });
  });

  describe('isHeapOrdered', () => {
    it('detects a child smaller than its parent', () => {
      const root = arena.createRoot(1);
      const child = arena.attachChild(root, 4);
      arena.attachChild(child, 5);
      arena.attachChild(child, 6);

      expect(isHeapOrdered(arena, root)).toBe(true);

      arena.attachChild(root, 0);
      expect(isHeapOrdered(arena, root)).toBe(false);
    });
  });

  it('keeps heap order while inserting level by level', () => {
    const nodes: NodeRef[] = [];
    for (const value of [5, 3, 8, 1, 9, 2, 7]) {
      const node =
        nodes.length === 0
          ? arena.createRoot(value)
          : arena.attachChild(nodes[Math.floor((nodes.length - 1) / 2)], value);
      nodes.push(node);
      siftUp(arena, node);
      expect(isHeapOrdered(arena, nodes[0])).toBe(true);
    }

    expect(arena.value(nodes[0])).toBe(1);
    expect(arena.subtreeSize(nodes[0])).toBe(7);
  });
});
