/**
 * Configuration exports.
 */

export {
  DEFAULT_TREE_CONFIG,
  RELINK_POLICIES,
  isRelinkPolicy,
  resolveTreeConfig,
} from './tree-config.js';
export type { RelinkPolicy, TreeConfig } from './tree-config.js';

export {
  loadConfig,
  validateExternalConfig,
  parseExternalConfig,
  EXTERNAL_DEFAULTS,
  PROJECT_CONFIG_FILE,
} from './loader.js';
export type { ExternalConfig, ResolvedConfig, LoadConfigOptions } from './loader.js';
