/**
 * linked-min-heap
 *
 * Binary min-heap nodes as an explicit linked tree: parents own their
 * children, children keep a non-owning back-reference to their parent.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Tree
export * from './tree/index.js';

// Utils
export {
  LinkedHeapError,
  InvalidRelationError,
  AlreadyAttachedError,
  DeadReferenceError,
  InvalidValueError,
  ConfigError,
  isErrorWithCode,
  isInvalidRelationError,
  isAlreadyAttachedError,
  isDeadReferenceError,
  isConfigError,
  wrapError,
} from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
