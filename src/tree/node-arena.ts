/**
 * Arena of heap tree nodes addressed by stable slot indices.
 *
 * Ownership runs strictly downward: a slot is released by its parent
 * (`detach`) or, for a root, by the caller (`release`), and the release
 * cascades through every owned descendant before the call returns. The
 * parent index a slot keeps is a plain back-reference with no lifetime
 * attached.
 */

import { resolveTreeConfig, type RelinkPolicy, type TreeConfig } from '../config/tree-config.js';
import { validateExternalConfig } from '../config/loader.js';
import {
  AlreadyAttachedError,
  ConfigError,
  DeadReferenceError,
  InvalidRelationError,
  InvalidValueError,
  type LinkedHeapError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { NodeRef, NodeSlot } from './types.js';

const log = createLogger('node-arena');

let nextArenaId = 1;

/**
 * Owns every node of one or more heap trees.
 *
 * All operations are synchronous and atomic: they either apply completely or
 * throw before touching any slot.
 */
export class NodeArena {
  /** Identifies refs issued by this arena */
  readonly id: number;

  private readonly config: TreeConfig;
  private slots: (NodeSlot | undefined)[] = [];
  private generations: number[] = [];
  private freeList: number[] = [];
  private liveCount = 0;

  constructor(config: Partial<TreeConfig> = {}) {
    const resolved = resolveTreeConfig(config);
    const errors = validateExternalConfig({ tree: resolved });
    if (errors.length > 0) {
      throw new ConfigError(`Invalid tree configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
    }

    this.config = resolved;
    this.id = nextArenaId++;
  }

  /**
   * Number of live nodes.
   */
  get size(): number {
    return this.liveCount;
  }

  get relinkPolicy(): RelinkPolicy {
    return this.config.relinkPolicy;
  }

  get maxChildren(): number {
    return this.config.maxChildren;
  }

  /**
   * Create a node with no parent and no children.
   */
  createRoot(value: number): NodeRef {
    this.assertValue(value);
    const ref = this.allocate({ value, parent: null, children: [] });
    log.debug('Created root', { index: ref.index, value });
    return ref;
  }

  /**
   * Create a node holding `value` and append it to `parent`'s children.
   */
  attachChild(parent: NodeRef, value: number): NodeRef {
    const parentSlot = this.resolve(parent);
    this.assertValue(value);
    this.assertCapacity(parent.index, parentSlot.children.length);

    const ref = this.allocate({ value, parent: parent.index, children: [] });
    parentSlot.children.push(ref.index);
    log.debug('Attached child', { parent: parent.index, child: ref.index, value });
    return ref;
  }

  /**
   * Make `child` the last child of `parent`.
   *
   * A child that already has a parent is rejected under the `forbid` policy
   * and moved off its old parent under `detach`. Either way no parent is left
   * holding a stale entry.
   */
  link(parent: NodeRef, child: NodeRef): void {
    const parentSlot = this.resolve(parent);
    const childSlot = this.resolve(child);

    if (parent.index === child.index) {
      throw this.rejected(
        new InvalidRelationError(`Cannot link node ${child.index} to itself`, 'SELF_LINK'),
      );
    }
    if (this.isAncestor(child.index, parent.index)) {
      throw this.rejected(
        new InvalidRelationError(
          `Linking node ${child.index} under node ${parent.index} would create a cycle`,
          'CYCLE',
        ),
      );
    }

    const oldParent = childSlot.parent;
    if (oldParent !== null && this.config.relinkPolicy === 'forbid') {
      throw this.rejected(
        new AlreadyAttachedError(`Node ${child.index} is already a child of node ${oldParent}`),
      );
    }

    // Relinking under the same parent frees its own entry first.
    const occupied = parentSlot.children.length - (oldParent === parent.index ? 1 : 0);
    this.assertCapacity(parent.index, occupied);

    if (oldParent !== null) {
      this.removeChildEntry(oldParent, child.index);
    }
    childSlot.parent = parent.index;
    parentSlot.children.push(child.index);
    log.debug('Linked nodes', { parent: parent.index, child: child.index, oldParent });
  }

  /**
   * Exchange the values of `parent` and its direct child `child`.
   *
   * Only the two values move; every edge and child ordering stays as it was.
   */
  swap(parent: NodeRef, child: NodeRef): void {
    const parentSlot = this.resolve(parent);
    const childSlot = this.resolve(child);

    if (childSlot.parent !== parent.index || !parentSlot.children.includes(child.index)) {
      throw this.rejected(
        new InvalidRelationError(
          `Node ${child.index} is not a direct child of node ${parent.index}`,
          'NOT_DIRECT_CHILD',
        ),
      );
    }

    const value = parentSlot.value;
    parentSlot.value = childSlot.value;
    childSlot.value = value;
  }

  /**
   * Get the value stored in a node.
   */
  value(node: NodeRef): number {
    return this.resolve(node).value;
  }

  /**
   * Get the values of a node's direct children in stored order.
   */
  childValues(node: NodeRef): number[] {
    return this.resolve(node).children.map((index) => this.slotAt(index).value);
  }

  /**
   * Get the parent of a node, or null for a root.
   */
  parentOf(node: NodeRef): NodeRef | null {
    const parent = this.resolve(node).parent;
    return parent === null ? null : this.refAt(parent);
  }

  /**
   * Get refs to a node's direct children in stored order.
   */
  childrenOf(node: NodeRef): NodeRef[] {
    return this.resolve(node).children.map((index) => this.refAt(index));
  }

  isRoot(node: NodeRef): boolean {
    return this.resolve(node).parent === null;
  }

  /**
   * Whether a ref still points at a live node of this arena. Never throws.
   */
  isLive(ref: NodeRef): boolean {
    return (
      ref.arena === this.id &&
      this.slots[ref.index] !== undefined &&
      this.generations[ref.index] === ref.generation
    );
  }

  /**
   * Count the nodes in the subtree rooted at `node`, itself included.
   */
  subtreeSize(node: NodeRef): number {
    this.resolve(node);
    let count = 0;
    const stack = [node.index];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      count++;
      for (const child of this.slotAt(index).children) {
        stack.push(child);
      }
    }
    return count;
  }

  /**
   * Have `parent` release its direct child `child` and the child's subtree.
   *
   * @returns Number of nodes released
   */
  detach(parent: NodeRef, child: NodeRef): number {
    const parentSlot = this.resolve(parent);
    const childSlot = this.resolve(child);

    const position = parentSlot.children.indexOf(child.index);
    if (childSlot.parent !== parent.index || position === -1) {
      throw this.rejected(
        new InvalidRelationError(
          `Node ${child.index} is not a direct child of node ${parent.index}`,
          'NOT_DIRECT_CHILD',
        ),
      );
    }

    // The parent's entry goes last; the edge stays whole until the subtree is released.
    const released = this.releaseSubtree(child.index);
    parentSlot.children.splice(position, 1);
    log.debug('Detached subtree', { parent: parent.index, child: child.index, released });
    return released;
  }

  /**
   * Release a root and its whole subtree.
   *
   * A node with a parent can only be released through that parent.
   *
   * @returns Number of nodes released
   */
  release(root: NodeRef): number {
    const slot = this.resolve(root);
    if (slot.parent !== null) {
      throw this.rejected(
        new InvalidRelationError(
          `Node ${root.index} is owned by node ${slot.parent}; detach it from there`,
          'NOT_A_ROOT',
        ),
      );
    }

    const released = this.releaseSubtree(root.index);
    log.debug('Released tree', { root: root.index, released });
    return released;
  }

  private allocate(slot: NodeSlot): NodeRef {
    let index = this.freeList.pop();
    if (index === undefined) {
      index = this.slots.length;
      this.slots.push(undefined);
      this.generations.push(0);
    }

    this.slots[index] = slot;
    this.liveCount++;
    return this.refAt(index);
  }

  private releaseSubtree(rootIndex: number): number {
    let released = 0;
    const stack = [rootIndex];

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      const slot = this.slots[index];
      if (slot === undefined) continue;

      for (const child of slot.children) {
        stack.push(child);
      }
      this.slots[index] = undefined;
      this.generations[index]++;
      this.freeList.push(index);
      this.liveCount--;
      released++;
    }

    return released;
  }

  private removeChildEntry(parentIndex: number, childIndex: number): void {
    const children = this.slotAt(parentIndex).children;
    const position = children.indexOf(childIndex);
    if (position === -1) {
      throw this.rejected(
        new InvalidRelationError(
          `Node ${parentIndex} has no child entry for node ${childIndex}`,
          'CORRUPT_TREE',
        ),
      );
    }
    children.splice(position, 1);
  }

  /**
   * Whether `candidate` is `index` or one of its ancestors.
   */
  private isAncestor(candidate: number, index: number): boolean {
    let current: number | null = index;
    while (current !== null) {
      if (current === candidate) return true;
      current = this.slotAt(current).parent;
    }
    return false;
  }

  private assertCapacity(parentIndex: number, occupied: number): void {
    const max = this.config.maxChildren;
    if (max > 0 && occupied >= max) {
      throw this.rejected(
        new InvalidRelationError(
          `Node ${parentIndex} already has ${max} children`,
          'CHILD_LIMIT',
        ),
      );
    }
  }

  private assertValue(value: number): void {
    if (!Number.isSafeInteger(value)) {
      throw this.rejected(new InvalidValueError(`Node value must be a safe integer, got ${value}`));
    }
  }

  private resolve(ref: NodeRef): NodeSlot {
    if (ref.arena !== this.id) {
      throw this.rejected(
        new DeadReferenceError(
          `Reference was issued by arena ${ref.arena}, not arena ${this.id}`,
          'FOREIGN_REFERENCE',
        ),
      );
    }

    const slot = this.slots[ref.index];
    if (slot === undefined || this.generations[ref.index] !== ref.generation) {
      throw this.rejected(
        new DeadReferenceError(`Node ${ref.index} (generation ${ref.generation}) has been released`),
      );
    }
    return slot;
  }

  /**
   * Slot for an index reached through the tree's own edges.
   */
  private slotAt(index: number): NodeSlot {
    const slot = this.slots[index];
    if (slot === undefined) {
      throw this.rejected(
        new InvalidRelationError(`Edge points at released slot ${index}`, 'CORRUPT_TREE'),
      );
    }
    return slot;
  }

  private refAt(index: number): NodeRef {
    return { arena: this.id, index, generation: this.generations[index] };
  }

  private rejected<E extends LinkedHeapError>(error: E): E {
    log.debug('Rejected operation', { code: error.code, message: error.message });
    return error;
  }
}
