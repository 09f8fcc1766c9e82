/**
 * Configuration Loader for the forge CLI
 * Loads and validates forge.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_CALL_DEPTH } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'forge.config.yaml';

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** REPL prompt */
  readonly prompt: string;
  /** Prompt shown while a multi-line unit is still open */
  readonly continuationPrompt: string;
  /** Function call nesting limit */
  readonly maxCallDepth: number;
  /** Whether the REPL prints the value of bare expressions */
  readonly echo: boolean;
}

export function createDefaultConfig(): CliConfig {
  return {
    prompt: 'forge> ',
    continuationPrompt: '  ... ',
    maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
    echo: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'prompt',
  'continuationPrompt',
  'maxCallDepth',
  'echo',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is Partial<CliConfig> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  for (const key of ['prompt', 'continuationPrompt'] as const) {
    if (key in data && typeof data[key] !== 'string') {
      throw new Error(`Invalid configuration: ${key} must be a string`);
    }
  }

  if ('maxCallDepth' in data) {
    const depth = data['maxCallDepth'];
    if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1) {
      throw new Error(
        `Invalid configuration: maxCallDepth must be a positive integer, got ${String(depth)}`
      );
    }
  }

  if ('echo' in data && typeof data['echo'] !== 'boolean') {
    throw new Error('Invalid configuration: echo must be a boolean');
  }
}

/**
 * Parse configuration text. An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(text: string): CliConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // Empty document
  if (parsedData === null || parsedData === undefined) {
    return createDefaultConfig();
  }

  validateConfig(parsedData);
  return { ...createDefaultConfig(), ...parsedData };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from an explicit path, or from forge.config.yaml in
 * `cwd` when present. Without either, the defaults apply.
 *
 * @throws Error when an explicit path does not exist or the file is invalid
 */
export function loadConfig(cwd: string, explicitPath?: string): CliConfig {
  const configPath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new Error(`Configuration file not found: ${explicitPath}`);
    }
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}
