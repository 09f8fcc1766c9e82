/**
 * Forge Language Tests: Control Flow
 * Conditionals, loops, break/continue, scoping and top-level return.
 */

import { describe, expect, it } from 'vitest';
import { FORGE_ERROR_CODES } from '../../src/index.js';
import { run, runError, runFull, runOutput } from '../helpers/runtime.js';

describe('Forge Language: control flow', () => {
  describe('if', () => {
    it('takes the matching branch of an else-if chain', () => {
      const source = `
        var grade = |n| {
          if n >= 90 { return "A"; } else if n >= 80 { return "B"; } else { return "C"; }
        };
        [grade(95), grade(85), grade(10)];
      `;
      expect(run(source)).toEqual(['A', 'B', 'C']);
    });

    it('requires a boolean condition', () => {
      const err = runError('if 1 { }');
      expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
      expect(err.message).toBe("cannot determine truthiness of value of type 'number' at 1:4");
    });
  });

  describe('while', () => {
    it('fails on the second check when the condition stops being boolean', () => {
      const err = runError('var p = true; while p { p = null; }');
      expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
      expect(err.message).toBe("cannot determine truthiness of value of type 'null' at 1:21");
    });

    it('skips the rest of an iteration on continue', () => {
      const source = `
        var i = 0;
        var odd = [];
        while i < 6 {
          i += 1;
          if i % 2 == 0 { continue; }
          odd = odd + [i];
        }
        odd;
      `;
      expect(run(source)).toEqual([1, 3, 5]);
    });

    it('leaves only the innermost loop on break', () => {
      const source = `
        var pairs = 0;
        for a in 0..3 {
          for b in 0..3 {
            if b > a { break; }
            pairs += 1;
          }
        }
        pairs;
      `;
      expect(run(source)).toBe(6);
    });
  });

  describe('for', () => {
    it('iterates a half-open range', () => {
      expect(runOutput('for x in 1..4 { print x; }')).toEqual(['1', '2', '3']);
    });

    it('squares 1..n through 1..n+1', () => {
      expect(runOutput('var n = 3; for x in 1..n + 1 { print x * x; }')).toEqual([
        '1',
        '4',
        '9',
      ]);
    });

    it('iterates nothing over an empty range', () => {
      expect(runOutput('for x in 3..1 { print x; }')).toEqual([]);
    });

    it('iterates a string by character', () => {
      expect(runOutput('for c in "hé" { print c; }')).toEqual(['h', 'é']);
    });

    it('visits items appended during the loop', () => {
      const source = `
        var xs = [1];
        for x in xs {
          if x < 3 { xs[xs.len..xs.len] = [x + 1]; }
          print x;
        }
      `;
      expect(runOutput(source)).toEqual(['1', '2', '3']);
    });

    it('does not leak the binding', () => {
      const err = runError('for i in 0..1 { }\nprint i;');
      expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
    });

    it('rejects a non-iterable value', () => {
      const err = runError('for x in 5 { }');
      expect(err.toData().message).toBe("cannot iterate over value of type 'number'");
    });

    it('rejects fractional range bounds', () => {
      const err = runError('for x in 0..1.5 { }');
      expect(err.toData().message).toBe('range bounds must be integers, found 1.5');
    });
  });

  describe('scoping', () => {
    it('confines declarations to their block', () => {
      expect(run('var x = 1; { var x = 2; } x;')).toBe(1);
    });

    it('assigns to the enclosing binding', () => {
      expect(run('var x = 1; { x = 2; } x;')).toBe(2);
    });

    it('allows redeclaration in the same scope', () => {
      expect(run('var x = 1; var x = "again"; x;')).toBe('again');
    });

    it('rejects assignment to an undeclared name', () => {
      const err = runError('y = 1;');
      expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
      expect(err.toData().message).toBe("undefined variable 'y'");
    });

    it('suggests a similar name', () => {
      const err = runError('var count = 1; print cont;');
      expect(err.toData().message).toBe("undefined variable 'cont'. Hint: Did you mean 'count'?");
    });
  });

  describe('program completion', () => {
    it('ends the program at a top-level return', () => {
      const { result, output } = runFull('print 1; return 5; print 2;');
      expect(result.value).toBe(5);
      expect(output).toEqual(['1']);
    });

    it('yields the last expression statement', () => {
      expect(run('1; 2; var x = 3;')).toBe(2);
    });

    it('rejects break at top level', () => {
      const err = runError('break;');
      expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_INVALID_CONTROL);
      expect(err.toData().message).toBe("'break' outside of a loop");
    });

    it('rejects continue inside a block at top level', () => {
      const err = runError('if true { continue; }');
      expect(err.toData().message).toBe("'continue' outside of a loop");
    });
  });
});
