/**
 * Types for the linked heap tree.
 */

/**
 * Non-owning handle to a node in a NodeArena.
 *
 * Holding a ref never keeps the node alive. Once the node is released the
 * generation no longer matches its slot and every operation through the ref
 * throws DeadReferenceError.
 */
export interface NodeRef {
  /** Id of the arena that issued this ref */
  readonly arena: number;
  /** Slot index inside the arena */
  readonly index: number;
  /** Slot generation at the time the ref was issued */
  readonly generation: number;
}

/**
 * Internal storage for one live node.
 */
export interface NodeSlot {
  value: number;
  /** Parent slot index; null for a root. Carries no ownership. */
  parent: number | null;
  /** Owned child slot indices in attachment order */
  children: number[];
}
