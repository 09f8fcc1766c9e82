/**
 * Forge Module
 * Exports lexer, parser, runtime, diagnostics and AST types
 */

export { LexerError, tokenize, tokenStream } from './lexer/index.js';
export { parse, parseReplInput, parseWithRecovery } from './parser/index.js';
export * from './runtime/index.js';
export { dumpAst } from './ast-dump.js';
export {
  enrichError,
  type EnrichedError,
  type EnrichedFrame,
  extractSnippet,
  type SnippetLine,
  type SourceSnippet,
  suggestSimilarNames,
} from './error-enrichment.js';
export { formatDiagnostic, formatDiagnostics, renderCaretUnderline } from './error-formatter.js';
export * from './types.js';
