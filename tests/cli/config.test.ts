/**
 * Forge CLI Tests: configuration
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../../src/cli-config.js';

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({
      prompt: 'forge> ',
      continuationPrompt: '  ... ',
      maxCallDepth: 200,
      echo: true,
    });
  });

  it('overrides only the keys given', () => {
    expect(parseConfig('prompt: "> "\nmaxCallDepth: 50\n')).toEqual({
      ...createDefaultConfig(),
      prompt: '> ',
      maxCallDepth: 50,
    });
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- prompt\n')).toThrow('Invalid configuration: must be a mapping');
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('colour: red\n')).toThrow('Invalid configuration: unknown key colour');
  });

  it('rejects a non-string prompt', () => {
    expect(() => parseConfig('continuationPrompt: 3\n')).toThrow(
      'Invalid configuration: continuationPrompt must be a string'
    );
  });

  it('rejects a call depth below one', () => {
    expect(() => parseConfig('maxCallDepth: 0\n')).toThrow(
      'Invalid configuration: maxCallDepth must be a positive integer, got 0'
    );
  });

  it('rejects a non-boolean echo flag', () => {
    expect(() => parseConfig('echo: "yes"\n')).toThrow(
      'Invalid configuration: echo must be a boolean'
    );
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfig('prompt: [\n')).toThrow(/^Invalid configuration: invalid YAML \(/);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forge-config-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  it('uses the defaults when no file exists', async () => {
    const empty = await fs.mkdtemp(path.join(tempDir, 'empty-'));
    expect(loadConfig(empty)).toEqual(createDefaultConfig());
  });

  it('reads forge.config.yaml from the working directory', async () => {
    const dir = await fs.mkdtemp(path.join(tempDir, 'project-'));
    await fs.writeFile(path.join(dir, CONFIG_FILE_NAME), 'echo: false\n');
    expect(loadConfig(dir).echo).toBe(false);
  });

  it('prefers an explicit path', async () => {
    const dir = await fs.mkdtemp(path.join(tempDir, 'explicit-'));
    await fs.writeFile(path.join(dir, CONFIG_FILE_NAME), 'echo: false\n');
    const explicit = path.join(dir, 'other.yaml');
    await fs.writeFile(explicit, 'prompt: "$ "\n');
    expect(loadConfig(dir, explicit)).toEqual({ ...createDefaultConfig(), prompt: '$ ' });
  });

  it('rejects a missing explicit path', () => {
    const missing = path.join(tempDir, 'missing.yaml');
    expect(() => loadConfig(tempDir, missing)).toThrow(
      `Configuration file not found: ${missing}`
    );
  });
});
