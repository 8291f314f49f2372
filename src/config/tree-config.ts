/**
 * Structural settings for a node arena.
 */

/**
 * What `link` does with a child that already has a parent.
 * - `forbid`: reject with AlreadyAttachedError
 * - `detach`: move it off the old parent's children first
 */
export type RelinkPolicy = 'forbid' | 'detach';

export const RELINK_POLICIES: readonly RelinkPolicy[] = ['forbid', 'detach'];

export interface TreeConfig {
  relinkPolicy: RelinkPolicy;
  /** Children allowed per node; 0 = unbounded. A binary heap sets 2. */
  maxChildren: number;
}

export const DEFAULT_TREE_CONFIG: TreeConfig = {
  relinkPolicy: 'forbid',
  maxChildren: 0,
};

export function isRelinkPolicy(value: unknown): value is RelinkPolicy {
  return value === 'forbid' || value === 'detach';
}

/**
 * Fill unset fields from `base` (defaults unless given).
 */
export function resolveTreeConfig(
  partial: Partial<TreeConfig> = {},
  base: TreeConfig = DEFAULT_TREE_CONFIG,
): TreeConfig {
  return {
    relinkPolicy: partial.relinkPolicy ?? base.relinkPolicy,
    maxChildren: partial.maxChildren ?? base.maxChildren,
  };
}
