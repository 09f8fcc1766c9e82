/**
 * Interactive REPL
 *
 * Reads one top-level unit at a time, keeps reading while brackets are
 * unbalanced, and evaluates each unit against one persistent context.
 * Errors are reported and the session keeps its variables.
 */

import type { CliConfig } from './cli-config.js';
import type { CliOutput } from './cli-shared.js';
import { formatDiagnostic, formatDiagnostics } from './error-formatter.js';
import { LexerError, tokenStream } from './lexer/index.js';
import { parseReplInput } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  inspectValue,
  typeName,
  type LineSource,
  type RuntimeContext,
} from './runtime/index.js';
import { ForgeError, TOKEN_TYPES } from './types.js';

export interface ReplOptions {
  readonly config: CliConfig;
  /** Lines typed at the prompt; also serves `input` inside programs */
  readonly input: LineSource;
  readonly output: CliOutput;
  /** Show a prompt without a line break */
  readonly showPrompt: (prompt: string) => void;
}

const HELP_TEXT = `Commands:
  :help    Show this help
  :env     List global variables
  :reset   Discard all variables
  :quit    Leave the REPL
Statements end with ';'. A bare expression without ';' prints its value.`;

/**
 * True when `source` opens more ( [ { than it closes, so the unit
 * continues on the next line. Lexing errors end the unit; the parser
 * reports them.
 */
export function hasUnclosedDelimiters(source: string): boolean {
  let depth = 0;
  try {
    for (const token of tokenStream(source)) {
      switch (token.type) {
        case TOKEN_TYPES.LPAREN:
        case TOKEN_TYPES.LBRACKET:
        case TOKEN_TYPES.LBRACE:
          depth++;
          break;
        case TOKEN_TYPES.RPAREN:
        case TOKEN_TYPES.RBRACKET:
        case TOKEN_TYPES.RBRACE:
          depth--;
          break;
      }
    }
  } catch (err) {
    if (err instanceof LexerError) return false;
    throw err;
  }
  return depth > 0;
}

/**
 * Run the REPL until `:quit` or end of input.
 */
export function runRepl(options: ReplOptions): void {
  const { config, input, output, showPrompt } = options;

  const createContext = (): RuntimeContext =>
    createRuntimeContext({
      maxCallDepth: config.maxCallDepth,
      io: {
        write: output.out,
        readLine: (prompt) => {
          if (prompt !== '') showPrompt(prompt);
          return input.readLine();
        },
      },
    });

  let ctx = createContext();
  let buffer = '';

  for (;;) {
    showPrompt(buffer === '' ? config.prompt : config.continuationPrompt);
    const line = input.readLine();
    if (line === null) {
      if (buffer.trim() !== '') evaluateUnit(buffer, ctx, config, output);
      return;
    }

    if (buffer === '' && line.trim().startsWith(':')) {
      const command = line.trim();
      if (command === ':quit') return;
      if (command === ':reset') {
        ctx = createContext();
        output.out('Environment cleared');
      } else {
        runCommand(command, ctx, output);
      }
      continue;
    }

    buffer = buffer === '' ? line : `${buffer}\n${line}`;
    if (hasUnclosedDelimiters(buffer)) continue;

    if (buffer.trim() !== '') evaluateUnit(buffer, ctx, config, output);
    buffer = '';
  }
}

function runCommand(command: string, ctx: RuntimeContext, output: CliOutput): void {
  switch (command) {
    case ':help':
      output.out(HELP_TEXT);
      return;
    case ':env': {
      const bindings = ctx.globals.bindings();
      if (bindings.length === 0) {
        output.out('(no variables)');
        return;
      }
      for (const [name, value] of bindings) {
        output.out(`${name}: ${typeName(value)} = ${inspectValue(value)}`);
      }
      return;
    }
    default:
      output.err(`Unknown command ${command}. Type :help for commands.`);
  }
}

/**
 * Parse and execute one unit. Parse errors are all reported and nothing
 * runs; a runtime error stops the unit but keeps earlier bindings.
 */
export function evaluateUnit(
  source: string,
  ctx: RuntimeContext,
  config: CliConfig,
  output: CliOutput
): void {
  const parsed = parseReplInput(source);
  if (!parsed.success) {
    output.err(formatDiagnostics(parsed.errors, source));
    return;
  }

  try {
    const result = execute(parsed.ast, ctx);
    if (config.echo) {
      for (const value of result.echoed) output.out(inspectValue(value));
    }
  } catch (err) {
    if (!(err instanceof ForgeError)) throw err;
    output.err(formatDiagnostic(err, source));
  }
}
