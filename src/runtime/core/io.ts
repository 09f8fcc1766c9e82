/**
 * Console I/O
 *
 * Synchronous line reading from a file descriptor. `input` blocks the
 * evaluator until a line arrives, and the REPL shares the same reader so
 * lines typed for `input` and lines typed at the prompt never race.
 */

import { readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import type { ForgeIO } from './types.js';

/** Source of input lines; null at end of input */
export interface LineSource {
  readLine(): string | null;
}

const CHUNK_SIZE = 4096;
const RETRY_DELAY_MS = 10;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Read lines from a file descriptor (standard input by default).
 * Trailing `\r` is dropped so CRLF input behaves like LF.
 */
export function createFdLineSource(fd = 0): LineSource {
  const decoder = new StringDecoder('utf8');
  const chunk = Buffer.alloc(CHUNK_SIZE);
  let buffered = '';
  let ended = false;

  const fill = (): void => {
    let bytes: number;
    try {
      bytes = readSync(fd, chunk, 0, CHUNK_SIZE, null);
    } catch (err) {
      // Non-blocking stdin reports EAGAIN until data is available
      if (isErrnoException(err) && err.code === 'EAGAIN') {
        sleep(RETRY_DELAY_MS);
        return;
      }
      if (isErrnoException(err) && err.code === 'EOF') {
        bytes = 0;
      } else {
        throw err;
      }
    }
    if (bytes === 0) {
      ended = true;
      buffered += decoder.end();
    } else {
      buffered += decoder.write(chunk.subarray(0, bytes));
    }
  };

  return {
    readLine(): string | null {
      for (;;) {
        const newline = buffered.indexOf('\n');
        if (newline >= 0) {
          const line = buffered.slice(0, newline);
          buffered = buffered.slice(newline + 1);
          return line.endsWith('\r') ? line.slice(0, -1) : line;
        }
        if (ended) {
          if (buffered === '') return null;
          const rest = buffered;
          buffered = '';
          return rest;
        }
        fill();
      }
    },
  };
}

/**
 * Line source over a fixed list of lines (scripted input, tests).
 */
export function createArrayLineSource(lines: readonly string[]): LineSource {
  let next = 0;
  return {
    readLine(): string | null {
      const line = lines[next];
      if (line === undefined) return null;
      next++;
      return line;
    },
  };
}

let stdinSource: LineSource | undefined;

/** Process-wide standard input reader, created on first use */
export function stdinLineSource(): LineSource {
  stdinSource ??= createFdLineSource(0);
  return stdinSource;
}

/**
 * Console-backed I/O: output through console.log, prompts to stdout,
 * input from `source` (standard input by default).
 */
export function createConsoleIO(source?: LineSource): ForgeIO {
  return {
    write: (line) => {
      console.log(line);
    },
    readLine: (prompt) => {
      if (prompt !== '') process.stdout.write(prompt);
      return (source ?? stdinLineSource()).readLine();
    },
  };
}
