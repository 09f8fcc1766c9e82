/**
 * Forge CLI Tests: forge command
 */

import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { main, parseArgs } from '../../src/cli-exec.js';
import { VERSION } from '../../src/index.js';

describe('forge', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forge-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function writeScript(name: string, content: string): Promise<string> {
    const scriptPath = path.join(tempDir, name);
    await fs.writeFile(scriptPath, content);
    return scriptPath;
  }

  function captureConsole() {
    const out: string[] = [];
    const err: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((text: unknown) => {
      out.push(String(text));
    });
    vi.spyOn(console, 'error').mockImplementation((text: unknown) => {
      err.push(String(text));
    });
    return { out, err };
  }

  describe('parseArgs', () => {
    it('starts the REPL without arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'repl', config: undefined });
    });

    it('parses a script file', () => {
      expect(parseArgs(['main.forge'])).toEqual({
        mode: 'exec',
        file: 'main.forge',
        ast: false,
        config: undefined,
      });
    });

    it('parses inline source', () => {
      expect(parseArgs(['-e', 'print 1;'])).toEqual({
        mode: 'eval',
        source: 'print 1;',
        ast: false,
        config: undefined,
      });
    });

    it('parses --ast and --config in any order', () => {
      expect(parseArgs(['--config', 'dev.yaml', 'main.forge', '--ast'])).toEqual({
        mode: 'exec',
        file: 'main.forge',
        ast: true,
        config: 'dev.yaml',
      });
    });

    it('parses help and version flags', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['main.forge', '-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['-v']).mode).toBe('version');
    });

    it('throws on unknown flags', () => {
      expect(() => parseArgs(['--unknown'])).toThrow('Unknown option: --unknown');
    });

    it('throws on a second file', () => {
      expect(() => parseArgs(['a.forge', 'b.forge'])).toThrow('Unexpected argument: b.forge');
    });

    it('throws when an option value is missing', () => {
      expect(() => parseArgs(['-e'])).toThrow('Missing source after -e');
      expect(() => parseArgs(['--config'])).toThrow('Missing file after --config');
    });

    it('throws when -e is combined with a file', () => {
      expect(() => parseArgs(['-e', 'print 1;', 'main.forge'])).toThrow(
        'Cannot combine -e with a file argument'
      );
    });

    it('throws when --ast has nothing to dump', () => {
      expect(() => parseArgs(['--ast'])).toThrow('Missing file argument for --ast');
    });
  });

  describe('main', () => {
    it('runs a script file', async () => {
      const { out } = captureConsole();
      const script = await writeScript('squares.forge', 'for x in 1..4 { print x * x; }\n');
      expect(await main([script])).toBe(0);
      expect(out).toEqual(['1', '4', '9']);
    });

    it('runs inline source', async () => {
      const { out } = captureConsole();
      expect(await main(['-e', 'print "hi";'])).toBe(0);
      expect(out).toEqual(['hi']);
    });

    it('exits with 1 and a diagnostic on a runtime error', async () => {
      const { err } = captureConsole();
      const script = await writeScript('broken.forge', 'print missing;\n');
      expect(await main([script])).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]?.split('\n')[0]).toBe('[ERROR] Runtime error at 1:7...');
    });

    it('reports a missing file', async () => {
      const { err } = captureConsole();
      const missing = path.join(tempDir, 'absent.forge');
      expect(await main([missing])).toBe(1);
      expect(err).toEqual([`File not found: ${missing}`]);
    });

    it('applies the call depth from --config', async () => {
      const { err } = captureConsole();
      const configPath = await writeScript('shallow.yaml', 'maxCallDepth: 3\n');
      const code = await main([
        '--config',
        configPath,
        '-e',
        'var f = |n| { return f(n + 1); }; f(0);',
      ]);
      expect(code).toBe(1);
      expect(err[0]?.split('\n').at(-1)).toBe('   maximum call depth of 3 exceeded');
    });

    it('reports argument errors', async () => {
      const { err } = captureConsole();
      expect(await main(['--bogus'])).toBe(1);
      expect(err).toEqual(['Unknown option: --bogus']);
    });

    it('prints the version', async () => {
      const { out } = captureConsole();
      expect(await main(['--version'])).toBe(0);
      expect(out).toEqual([`forge ${VERSION}`]);
    });
  });
});
