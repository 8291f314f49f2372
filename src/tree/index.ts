/**
 * Linked heap tree exports.
 */

// Node arena
export { NodeArena } from './node-arena.js';
export type { NodeRef, NodeSlot } from './types.js';

// Heap maintenance
export { siftUp, siftDown, isHeapOrdered } from './sift.js';

// Verification
export { verifyTree, assertTree } from './invariants.js';
export type { TreeView } from './invariants.js';
