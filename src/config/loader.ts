/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Overrides (passed directly)
 * 2. Environment variables (LINKED_HEAP_*)
 * 3. Project config file (./linked-heap.config.json)
 * 4. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_TREE_CONFIG,
  isRelinkPolicy,
  RELINK_POLICIES,
  resolveTreeConfig,
  type TreeConfig,
} from './tree-config.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

export const PROJECT_CONFIG_FILE = 'linked-heap.config.json';

/** External config file structure (matches config.schema.json) */
export interface ExternalConfig {
  tree?: Partial<TreeConfig>;
}

export interface ResolvedConfig {
  tree: TreeConfig;
}

export const EXTERNAL_DEFAULTS: ResolvedConfig = {
  tree: { ...DEFAULT_TREE_CONFIG },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow parsed JSON to the known config shape.
 * Fields of the wrong type are dropped with a warning.
 */
export function parseExternalConfig(raw: unknown, source: string): ExternalConfig {
  if (!isRecord(raw)) {
    log.warn(`Ignoring ${source}: expected a JSON object`);
    return {};
  }

  const config: ExternalConfig = {};
  const tree = raw.tree;
  if (tree === undefined) {
    return config;
  }
  if (!isRecord(tree)) {
    log.warn(`Ignoring ${source}: "tree" must be an object`);
    return config;
  }

  config.tree = {};
  if (tree.relinkPolicy !== undefined) {
    if (isRelinkPolicy(tree.relinkPolicy)) {
      config.tree.relinkPolicy = tree.relinkPolicy;
    } else {
      log.warn(`Ignoring tree.relinkPolicy in ${source}`, { value: tree.relinkPolicy });
    }
  }
  if (tree.maxChildren !== undefined) {
    if (typeof tree.maxChildren === 'number') {
      config.tree.maxChildren = tree.maxChildren;
    } else {
      log.warn(`Ignoring tree.maxChildren in ${source}`, { value: tree.maxChildren });
    }
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    return parseExternalConfig(JSON.parse(content), path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Examples:
 *   LINKED_HEAP_TREE_RELINK_POLICY=detach
 *   LINKED_HEAP_TREE_MAX_CHILDREN=2
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  const policy = process.env.LINKED_HEAP_TREE_RELINK_POLICY;
  if (policy) {
    if (isRelinkPolicy(policy)) {
      config.tree = config.tree ?? {};
      config.tree.relinkPolicy = policy;
    } else {
      log.warn('Ignoring LINKED_HEAP_TREE_RELINK_POLICY', { value: policy });
    }
  }
  if (process.env.LINKED_HEAP_TREE_MAX_CHILDREN) {
    config.tree = config.tree ?? {};
    config.tree.maxChildren = Number(process.env.LINKED_HEAP_TREE_MAX_CHILDREN);
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
function merge(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    tree: resolveTreeConfig(source.tree, target.tree),
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  if (config.tree?.relinkPolicy !== undefined && !isRelinkPolicy(config.tree.relinkPolicy)) {
    errors.push(`tree.relinkPolicy must be one of: ${RELINK_POLICIES.join(', ')}`);
  }
  if (config.tree?.maxChildren !== undefined) {
    if (!Number.isInteger(config.tree.maxChildren) || config.tree.maxChildren < 0) {
      errors.push('tree.maxChildren must be an integer >= 0 (0 = unbounded)');
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * @throws ConfigError with code CONFIG_INVALID when the merged result fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = merge(EXTERNAL_DEFAULTS, {});

  if (!options.skipProjectConfig) {
    const projectConfigPath = options.projectConfigPath ?? join(process.cwd(), PROJECT_CONFIG_FILE);
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = merge(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = merge(config, loadEnvConfig());
  }

  if (options.overrides) {
    config = merge(config, options.overrides);
  }

  const errors = validateExternalConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  log.debug('Configuration loaded', { tree: config.tree });
  return config;
}
