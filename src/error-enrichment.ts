/**
 * Error Enrichment
 * Functions for extracting source snippets and suggesting similar names
 */

import type { DiagnosticFrame, ErrorStage, ForgeError, ForgeErrorCode, SourceSpan } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedFrame extends DiagnosticFrame {
  readonly snippet?: SourceSnippet | undefined;
}

export interface EnrichedError {
  readonly code: ForgeErrorCode;
  readonly stage: ErrorStage;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly contextTrail: readonly string[];
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly frames: readonly EnrichedFrame[];
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around an error location.
 *
 * Line numbers are 1-based. A trailing `\r` is dropped from each line.
 *
 * @param contextLines - Lines shown before and after the span
 * @throws {RangeError} When span exceeds source bounds
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = splitLines(source);
  if (!spanFits(span, lines.length)) {
    throw new RangeError('Span exceeds source bounds');
  }

  const errorStartLine = span.start.line;
  const errorEndLine = span.end.line;
  const firstLine = Math.max(1, errorStartLine - contextLines);
  const lastLine = Math.min(lines.length, errorEndLine + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum >= errorStartLine && lineNum <= errorEndLine,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

function splitLines(source: string): string[] {
  return source.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

function spanFits(span: SourceSpan, lineCount: number): boolean {
  return (
    span.start.line >= 1 &&
    span.start.line <= lineCount &&
    span.end.line >= 1 &&
    span.end.line <= lineCount
  );
}

// ============================================================
// NAME SUGGESTION
// ============================================================

/**
 * Find similar names using fuzzy matching.
 *
 * - Edit distance threshold: <= 2
 * - Max suggestions: 3
 * - Sort: ascending by distance, then alphabetically
 */
export function suggestSimilarNames(target: string, candidates: readonly string[]): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  const candidatesWithDistance = candidates
    .filter((candidate) => candidate !== target)
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/**
 * Levenshtein distance over code points, keeping only the previous row.
 */
function levenshteinDistance(left: string, right: string): number {
  let a = Array.from(left);
  let b = Array.from(right);
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;
  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;
    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost // substitution
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Attach source snippets to an error and each of its secondary frames.
 * Spans that fall outside `source` get no snippet.
 *
 * @param contextLines - Lines shown around each span (default: none)
 */
export function enrichError(
  error: ForgeError,
  source: string,
  contextLines: number = 0
): EnrichedError {
  const data = error.toData();
  const snippetFor = (span: SourceSpan | undefined): SourceSnippet | undefined => {
    if (!span || source === '' || !spanFits(span, splitLines(source).length)) {
      return undefined;
    }
    return extractSnippet(source, span, contextLines);
  };

  return {
    code: data.code,
    stage: data.stage,
    message: data.message,
    span: data.span,
    contextTrail: data.contextTrail ?? [],
    sourceSnippet: snippetFor(data.span),
    frames: (data.frames ?? []).map((frame) => ({
      label: frame.label,
      span: frame.span,
      snippet: snippetFor(frame.span),
    })),
  };
}
