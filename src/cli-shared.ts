/**
 * CLI Shared Utilities
 * Common formatting and execution helpers for the forge CLI
 */

import { dumpAst } from './ast-dump.js';
import type { CliConfig } from './cli-config.js';
import { formatDiagnostic, formatDiagnostics } from './error-formatter.js';
import { parseWithRecovery } from './parser/index.js';
import { createRuntimeContext, execute, VERSION, type ForgeIO } from './runtime/index.js';
import { ForgeError } from './types.js';

/** Where the CLI sends results and diagnostics */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
  /** Line reader for `input`; defaults to standard input */
  readLine?: ForgeIO['readLine'];
}

export const consoleOutput: CliOutput = {
  out: (text) => {
    console.log(text);
  },
  err: (text) => {
    console.error(text);
  },
};

/**
 * Format error for stderr output.
 * Forge errors render as full diagnostics when the source is known.
 */
export function formatError(err: unknown, source?: string): string {
  if (err instanceof ForgeError) {
    return source !== undefined ? formatDiagnostic(err, source) : err.message;
  }

  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err &&
    typeof err.path === 'string'
  ) {
    return `File not found: ${err.path}`;
  }

  return err instanceof Error ? err.message : String(err);
}

export interface RunOptions {
  readonly config: CliConfig;
  /** Print the syntax tree instead of executing */
  readonly ast: boolean;
}

/**
 * Parse and run one program, reporting every parse error or the runtime
 * error that stopped it.
 *
 * @returns Process exit code: 0 on success, 1 on any Forge error
 */
export function runSource(source: string, options: RunOptions, output: CliOutput): number {
  const result = parseWithRecovery(source);
  if (!result.success) {
    output.err(formatDiagnostics(result.errors, source));
    return 1;
  }

  if (options.ast) {
    output.out(dumpAst(result.ast));
    return 0;
  }

  const ctx = createRuntimeContext({
    maxCallDepth: options.config.maxCallDepth,
    io: output.readLine ? { write: output.out, readLine: output.readLine } : { write: output.out },
  });

  try {
    execute(result.ast, ctx);
  } catch (err) {
    if (!(err instanceof ForgeError)) throw err;
    output.err(formatDiagnostic(err, source));
    return 1;
  }
  return 0;
}

export { VERSION };
