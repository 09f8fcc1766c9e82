#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main() and parseArgs() for the forge binary.
 * Runs script files, inline source (-e) or the interactive REPL.
 */

import * as fs from 'fs/promises';
import { loadConfig } from './cli-config.js';
import { runRepl } from './cli-repl.js';
import { consoleOutput, formatError, runSource, VERSION } from './cli-shared.js';
import { stdinLineSource } from './runtime/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'repl'; config: string | undefined }
  | { mode: 'exec'; file: string; ast: boolean; config: string | undefined }
  | { mode: 'eval'; source: string; ast: boolean; config: string | undefined }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  forge                      Start the interactive REPL
  forge <file>               Run a Forge program
  forge -e <source>          Run source given on the command line
  forge --ast <file>         Print the syntax tree instead of running
  forge --config <file>      Read settings from a YAML file
                             (default: ./forge.config.yaml when present)
  forge --help               Show this help message
  forge --version            Show version information

Examples:
  forge hello.forge
  forge -e 'print 6 * 7;'`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // --help and --version win in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let inline: string | undefined;
  let config: string | undefined;
  let ast = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--ast') {
      ast = true;
    } else if (arg === '--config' || arg === '-e') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(arg === '-e' ? 'Missing source after -e' : 'Missing file after --config');
      }
      if (arg === '-e') inline = value;
      else config = value;
      i++;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (inline !== undefined) {
    if (file !== undefined) {
      throw new Error('Cannot combine -e with a file argument');
    }
    return { mode: 'eval', source: inline, ast, config };
  }
  if (file !== undefined) {
    return { mode: 'exec', file, ast, config };
  }
  if (ast) {
    throw new Error('Missing file argument for --ast');
  }
  return { mode: 'repl', config };
}

/**
 * Entry point for the forge binary
 *
 * @returns Process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(`forge ${VERSION}`);
        return 0;

      case 'repl': {
        const config = loadConfig(process.cwd(), parsed.config);
        runRepl({
          config,
          input: stdinLineSource(),
          output: consoleOutput,
          showPrompt: (prompt) => {
            process.stdout.write(prompt);
          },
        });
        return 0;
      }

      case 'eval': {
        const config = loadConfig(process.cwd(), parsed.config);
        return runSource(parsed.source, { config, ast: parsed.ast }, consoleOutput);
      }

      case 'exec': {
        const config = loadConfig(process.cwd(), parsed.config);
        const source = await fs.readFile(parsed.file, 'utf-8');
        return runSource(source, { config, ast: parsed.ast }, consoleOutput);
      }
    }
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(formatError(err));
      process.exitCode = 1;
    }
  );
}
