/**
 * Standardized error types for linked-min-heap.
 *
 * All errors extend from LinkedHeapError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { InvalidRelationError } from './errors.js';
 *
 * throw new InvalidRelationError('Node 4 is not a child of node 1', 'NOT_DIRECT_CHILD');
 * ```
 *
 * Every operation on a tree is synchronous and atomic, so these are thrown
 * straight to the caller and never retried.
 *
 * @module utils/errors
 */

/**
 * Base error class for all linked-min-heap errors.
 */
export class LinkedHeapError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof LinkedHeapError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Structural Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An operation named two nodes that do not stand in the required relation.
 *
 * Common codes:
 * - `NOT_DIRECT_CHILD`: swap/detach target is not a direct child of the parent
 * - `NOT_A_ROOT`: release called on a node that still has a parent
 * - `SELF_LINK`: link called with the same node on both sides
 * - `CYCLE`: link would make a node its own ancestor
 * - `CHILD_LIMIT`: parent already holds `maxChildren` children
 * - `CORRUPT_TREE`: verification found broken parent/child bookkeeping
 */
export class InvalidRelationError extends LinkedHeapError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * link called on a node that already has a parent under the `forbid` policy.
 *
 * Common codes:
 * - `ALREADY_ATTACHED`
 */
export class AlreadyAttachedError extends LinkedHeapError {
  constructor(message: string, code: string = 'ALREADY_ATTACHED', cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * A reference no longer resolves to a live node.
 *
 * Common codes:
 * - `DEAD_REFERENCE`: the node (or an ancestor) was released
 * - `FOREIGN_REFERENCE`: the reference was issued by a different arena
 */
export class DeadReferenceError extends LinkedHeapError {
  constructor(message: string, code: string = 'DEAD_REFERENCE', cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * A node value is not a safe integer.
 *
 * Common codes:
 * - `INVALID_VALUE`
 */
export class InvalidValueError extends LinkedHeapError {
  constructor(message: string, code: string = 'INVALID_VALUE', cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: Failed to parse configuration
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends LinkedHeapError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a linked-min-heap error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof LinkedHeapError && error.code === code;
}

export function isInvalidRelationError(error: unknown): error is InvalidRelationError {
  return error instanceof InvalidRelationError;
}

export function isAlreadyAttachedError(error: unknown): error is AlreadyAttachedError {
  return error instanceof AlreadyAttachedError;
}

export function isDeadReferenceError(error: unknown): error is DeadReferenceError {
  return error instanceof DeadReferenceError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a LinkedHeapError.
 *
 * If the error is already a LinkedHeapError, returns it unchanged.
 * Otherwise wraps it with the UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): LinkedHeapError {
  if (error instanceof LinkedHeapError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new LinkedHeapError(errorMessage, 'UNKNOWN', error);
}
