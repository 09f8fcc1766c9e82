/**
 * Diagnostic Formatter
 * Render errors as text reports with source snippets and caret underlines
 */

import { enrichError, type SourceSnippet } from './error-enrichment.js';
import type { ErrorStage, ForgeError, SourceSpan } from './types.js';

const STAGE_LABELS: Record<ErrorStage, string> = {
  lexing: 'Lexing',
  parsing: 'Parsing',
  runtime: 'Runtime',
};

/** Indent of trail, frame and message lines */
const INDENT = '   ';

/** Indent of the line-number gutter */
const GUTTER_INDENT = '        ';

/**
 * Render one error:
 *
 * ```text
 * [ERROR] Runtime error at 1:29...
 *         1| var f = || { print "hi"; }; f(1);
 *          |                             ^^^^
 *    ...function declared at 1:9...
 *         1| var f = || { print "hi"; }; f(1);
 *          |         ^^^^^^^^^^^^^^^^^^
 *    wrong number of arguments: expected 0, found 1
 * ```
 *
 * Parse errors list their context trail, innermost first, under the header.
 */
export function formatDiagnostic(error: ForgeError, source: string): string {
  const enriched = enrichError(error, source);
  const stage = STAGE_LABELS[enriched.stage];
  const location = enriched.span
    ? ` at ${enriched.span.start.line}:${enriched.span.start.column}`
    : '';

  const out: string[] = [`[ERROR] ${stage} error${location}...`];
  for (const label of enriched.contextTrail) {
    out.push(`${INDENT}...while parsing ${label}...`);
  }
  if (enriched.sourceSnippet) {
    out.push(...renderSnippet(enriched.sourceSnippet));
  }
  for (const frame of enriched.frames) {
    out.push(`${INDENT}...${frame.label}...`);
    if (frame.snippet) out.push(...renderSnippet(frame.snippet));
  }
  out.push(`${INDENT}${enriched.message}`);
  return out.join('\n');
}

/** Render several reports separated by blank lines */
export function formatDiagnostics(errors: readonly ForgeError[], source: string): string {
  return errors.map((error) => formatDiagnostic(error, source)).join('\n\n');
}

/** Source line plus caret line for the first line of the highlighted span */
function renderSnippet(snippet: SourceSnippet): string[] {
  const span = snippet.highlightSpan;
  const line = snippet.lines.find((l) => l.lineNumber === span.start.line);
  if (!line) return [];

  const number = String(line.lineNumber);
  return [
    `${GUTTER_INDENT}${number}| ${line.content}`,
    `${' '.repeat(GUTTER_INDENT.length + number.length)}| ${renderCaretUnderline(line.content, span)}`,
  ];
}

/**
 * Caret underline for `span` on its first line: one `^` per code point
 * covered, running to the end of the line for multi-line spans. Always
 * at least one caret.
 */
export function renderCaretUnderline(lineContent: string, span: SourceSpan): string {
  const column = span.start.column;
  const lineLength = Array.from(lineContent).length;
  const width =
    span.end.line === span.start.line
      ? span.end.column - column
      : lineLength - (column - 1);
  return ' '.repeat(Math.max(0, column - 1)) + '^'.repeat(Math.max(1, width));
}
