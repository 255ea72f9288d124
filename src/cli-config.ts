/**
 * Configuration Loader for the grove CLI
 * Loads and validates grove.config.yaml from the working directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { LoopScopePolicy } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'grove.config.yaml';

const KNOWN_KEYS = new Set(['loopScope', 'maxCallDepth', 'trace']);

// ============================================================
// TYPES
// ============================================================

export interface GroveConfig {
  loopScope?: LoopScopePolicy | undefined;
  maxCallDepth?: number | undefined;
  trace?: boolean | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLoopScopePolicy(value: unknown): value is LoopScopePolicy {
  return value === 'per-iteration' || value === 'shared';
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): GroveConfig {
  // An empty file parses to null
  if (data === null || data === undefined) return {};

  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key "${key}"`);
    }
  }

  const config: GroveConfig = {};

  const loopScope = data['loopScope'];
  if (loopScope !== undefined) {
    if (!isLoopScopePolicy(loopScope)) {
      throw new Error(
        `Invalid configuration: loopScope must be 'per-iteration' or 'shared', got ${JSON.stringify(loopScope)}`
      );
    }
    config.loopScope = loopScope;
  }

  const maxCallDepth = data['maxCallDepth'];
  if (maxCallDepth !== undefined) {
    if (
      typeof maxCallDepth !== 'number' ||
      !Number.isInteger(maxCallDepth) ||
      maxCallDepth < 1
    ) {
      throw new Error(
        `Invalid configuration: maxCallDepth must be a positive integer, got ${JSON.stringify(maxCallDepth)}`
      );
    }
    config.maxCallDepth = maxCallDepth;
  }

  const trace = data['trace'];
  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(
        `Invalid configuration: trace must be a boolean, got ${JSON.stringify(trace)}`
      );
    }
    config.trace = trace;
  }

  return config;
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load configuration from grove.config.yaml in `cwd`.
 * Returns an empty configuration when the file does not exist.
 *
 * @throws Error if the file is not valid YAML or fails validation
 */
export function loadConfig(cwd: string): GroveConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  const content = readFileSync(configPath, 'utf-8');
  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration: ${reason}`);
  }

  return validateConfig(data);
}
