/**
 * Tests for verifyTree / assertTree.
 */

import { describe, it, expect } from 'vitest';
import { NodeArena } from '../../src/tree/node-arena.js';
import { assertTree, verifyTree, type TreeView } from '../../src/tree/invariants.js';
import type { NodeRef } from '../../src/tree/types.js';
import { InvalidRelationError } from '../../src/utils/errors.js';

interface FakeNode {
  parent: number | null;
  children: number[];
  live?: boolean;
}

/** A hand-built view, for layouts the arena itself never produces. */
function viewOf(nodes: Record<number, FakeNode>): TreeView {
  const ref = (index: number): NodeRef => ({ arena: 0, index, generation: 0 });
  const lookup = (node: NodeRef): FakeNode => {
    const found = nodes[node.index];
    if (found === undefined) throw new Error(`no node ${node.index}`);
    return found;
  };

  return {
    isLive: (node) => nodes[node.index] !== undefined && nodes[node.index].live !== false,
    parentOf: (node) => {
      const parent = lookup(node).parent;
      return parent === null ? null : ref(parent);
    },
    childrenOf: (node) => lookup(node).children.map(ref),
  };
}

const ROOT: NodeRef = { arena: 0, index: 0, generation: 0 };

describe('verifyTree', () => {
  it('finds nothing wrong in a tree built through the arena', () => {
    const arena = new NodeArena({ relinkPolicy: 'detach' });
    const root = arena.createRoot(5);
    const a = arena.attachChild(root, 24);
    const b = arena.attachChild(root, 3);
    const c = arena.attachChild(a, 30);
    arena.link(b, c);
    arena.swap(root, b);

    expect(verifyTree(arena, root)).toEqual([]);
    expect(() => assertTree(arena, root)).not.toThrow();
  });

  it('reports a subtree root that still has a parent', () => {
    const arena = new NodeArena();
    const root = arena.createRoot(1);
    const child = arena.attachChild(root, 2);

    expect(verifyTree(arena, child)).toEqual([`root ${child.index} has parent ${root.index}`]);
  });

  it('reports a released root', () => {
    const arena = new NodeArena();
    const root = arena.createRoot(1);
    arena.release(root);

    expect(verifyTree(arena, root)).toEqual([`root ${root.index} is not a live node`]);
  });
});

describe('verifyTree on damaged layouts', () => {
  it('reports a back-reference that names another parent', () => {
    const view = viewOf({
      0: { parent: null, children: [1] },
      1: { parent: 2, children: [] },
      2: { parent: null, children: [] },
    });

    expect(verifyTree(view, ROOT)).toEqual(['node 1 is a child of 0 but its parent is 2']);
  });

  it('reports a child shared by two parents', () => {
    const view = viewOf({
      0: { parent: null, children: [1, 2] },
      1: { parent: 0, children: [3] },
      2: { parent: 0, children: [3] },
      3: { parent: 1, children: [] },
    });

    expect(verifyTree(view, ROOT)).toEqual([
      'node 3 is a child of 2 but its parent is 1',
      'node 3 is reachable more than once',
    ]);
  });

  it('reports a cycle back to the root', () => {
    const view = viewOf({
      0: { parent: null, children: [1] },
      1: { parent: 0, children: [0] },
    });

    expect(verifyTree(view, ROOT)).toEqual(['node 0 is reachable more than once']);
  });

  it('reports a child entry naming a released node instead of throwing', () => {
    const view = viewOf({
      0: { parent: null, children: [1] },
      1: { parent: 0, children: [], live: false },
    });

    expect(verifyTree(view, ROOT)).toEqual(['node 0 lists released node 1 as a child']);
  });
});

describe('assertTree', () => {
  it('throws CORRUPT_TREE listing the violations', () => {
    const arena = new NodeArena();
    const root = arena.createRoot(1);
    const child = arena.attachChild(root, 2);

    try {
      assertTree(arena, child);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRelationError);
      expect(error).toMatchObject({
        code: 'CORRUPT_TREE',
        message: 'Tree is inconsistent: root 1 has parent 0',
      });
    }
  });
});
