/**
 * Structural checks over a tree held in a NodeArena.
 */

import { InvalidRelationError } from '../utils/errors.js';
import type { NodeArena } from './node-arena.js';
import type { NodeRef } from './types.js';

/**
 * The read-only part of an arena a walk needs.
 */
export type TreeView = Pick<NodeArena, 'isLive' | 'parentOf' | 'childrenOf'>;

/**
 * Walk the tree under `root` and describe every structural violation found:
 * a root with a parent, a child entry naming a released node, a child whose
 * parent back-reference points elsewhere, and a node reached twice (a cycle
 * or a shared child).
 *
 * Returns an empty array for a sound tree.
 */
export function verifyTree(arena: TreeView, root: NodeRef): string[] {
  if (!arena.isLive(root)) {
    return [`root ${root.index} is not a live node`];
  }

  const violations: string[] = [];
  const rootParent = arena.parentOf(root);
  if (rootParent !== null) {
    violations.push(`root ${root.index} has parent ${rootParent.index}`);
  }

  const visited = new Set<number>([root.index]);
  const stack = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    for (const child of arena.childrenOf(node)) {
      if (visited.has(child.index)) {
        violations.push(`node ${child.index} is reachable more than once`);
        continue;
      }
      visited.add(child.index);

      if (!arena.isLive(child)) {
        violations.push(`node ${node.index} lists released node ${child.index} as a child`);
        continue;
      }

      const back = arena.parentOf(child);
      if (back === null || back.index !== node.index) {
        violations.push(
          `node ${child.index} is a child of ${node.index} but its parent is ${back === null ? 'none' : back.index}`,
        );
      }
      stack.push(child);
    }
  }

  return violations;
}

/**
 * Throw InvalidRelationError (CORRUPT_TREE) if `verifyTree` finds anything.
 */
export function assertTree(arena: TreeView, root: NodeRef): void {
  const violations = verifyTree(arena, root);
  if (violations.length > 0) {
    throw new InvalidRelationError(`Tree is inconsistent: ${violations.join('; ')}`, 'CORRUPT_TREE');
  }
}
