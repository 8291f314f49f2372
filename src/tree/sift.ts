/**
 * Heap-order maintenance over a NodeArena.
 *
 * Both walks move values, not nodes: each step is a parent/child swap, so
 * the tree's shape and every ref into it stay where they were.
 */

import type { NodeArena } from './node-arena.js';
import type { NodeRef } from './types.js';

/**
 * Move the value at `node` toward the root while it is smaller than its
 * parent's.
 *
 * @returns Ref to the node where the value came to rest
 */
export function siftUp(arena: NodeArena, node: NodeRef): NodeRef {
  let current = node;
  let parent = arena.parentOf(current);

  while (parent !== null && arena.value(current) < arena.value(parent)) {
    arena.swap(parent, current);
    current = parent;
    parent = arena.parentOf(current);
  }

  return current;
}

/**
 * Move the value at `node` toward the leaves while a child holds a smaller
 * value. The smallest child wins; on ties the earlier child does.
 *
 * @returns Ref to the node where the value came to rest
 */
export function siftDown(arena: NodeArena, node: NodeRef): NodeRef {
  let current = node;

  while (true) {
    const smallest = smallestChild(arena, current);
    if (smallest === null || arena.value(smallest) >= arena.value(current)) {
      return current;
    }

    arena.swap(current, smallest);
    current = smallest;
  }
}

function smallestChild(arena: NodeArena, node: NodeRef): NodeRef | null {
  let smallest: NodeRef | null = null;
  for (const child of arena.childrenOf(node)) {
    if (smallest === null || arena.value(child) < arena.value(smallest)) {
      smallest = child;
    }
  }
  return smallest;
}

/**
 * Whether every node under `root` holds a value no larger than its children's.
 */
export function isHeapOrdered(arena: NodeArena, root: NodeRef): boolean {
  const stack = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    const value = arena.value(node);
    for (const child of arena.childrenOf(node)) {
      if (arena.value(child) < value) {
        return false;
      }
      stack.push(child);
    }
  }

  return true;
}
