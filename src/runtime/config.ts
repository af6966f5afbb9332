/**
 * Configuration loader.
 *
 * Loads conscell.config.json from the working directory or a specified path
 * and turns it into interpreter options.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { InterpreterOptions } from './interpreter';

const CONFIG_FILENAMES = ['conscell.config.json', '.conscellrc.json'];

export interface LispConfig {
  /** Print trace messages while evaluating. */
  trace?: boolean;
  /** Maximum nesting of evaluate/apply before RecursionDepthExceeded. */
  maxDepth?: number;
  /** Maximum iterations of a single while loop. Unbounded when absent. */
  maxIterations?: number;
}

/**
 * Load configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. conscell.config.json in cwd
 * 3. .conscellrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): LispConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return loadConfigFrom(process.cwd());
}

/**
 * Look for a config file in the given directory only.
 */
export function loadConfigFrom(dir: string): LispConfig {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  // No config file found — return empty config
  return {};
}

function readConfigFile(filePath: string): LispConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(raw: unknown, filePath: string): LispConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: LispConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const trace = entries.get('trace');
  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  for (const key of ['maxDepth', 'maxIterations'] as const) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid "${key}" in ${filePath}: must be a positive integer`);
    }
    config[key] = value;
  }

  return config;
}

/**
 * Map a loaded config onto interpreter options, leaving unset keys to the
 * interpreter's defaults.
 */
export function interpreterOptionsFromConfig(config: LispConfig): InterpreterOptions {
  const options: InterpreterOptions = {};
  if (config.trace !== undefined) options.trace = config.trace;
  if (config.maxDepth !== undefined) options.maxDepth = config.maxDepth;
  if (config.maxIterations !== undefined) options.maxIterations = config.maxIterations;
  return options;
}
