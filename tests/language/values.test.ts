/**
 * Forge Language Tests: Values and Operators
 * Arithmetic, comparison, logic, clone/mirror and printed forms.
 */

import { describe, expect, it } from 'vitest';
import { FORGE_ERROR_CODES } from '../../src/index.js';
import { run, runError, runOutput } from '../helpers/runtime.js';

describe('Forge Language: operators', () => {
  it('uses floating point arithmetic', () => {
    expect(run('10 / 4;')).toBe(2.5);
    expect(run('7 % 3;')).toBe(1);
    expect(run('1 / 0;')).toBe(Infinity);
  });

  it('applies compound assignment', () => {
    expect(run('var x = 10; x -= 3; x *= 2; x /= 7; x %= 2; x;')).toBe(0);
  });

  it('rejects mixed operand types', () => {
    const err = runError('1 + "a";');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe(
      "cannot apply '+' to values of type 'number' and 'string'"
    );
  });

  it('rejects ordering across types', () => {
    const err = runError('1 < "a";');
    expect(err.toData().message).toBe("cannot compare values of type 'number' and 'string'");
  });

  it('rejects negating a string', () => {
    const err = runError('-"a";');
    expect(err.toData().message).toBe("cannot negate value of type 'string'");
  });

  it('compares values of different types as unequal', () => {
    expect(run('1 == "1";')).toBe(false);
    expect(run("'a' == \"a\";")).toBe(false);
    expect(run('null != false;')).toBe(true);
  });

  it('compares ranges and nested lists structurally', () => {
    expect(run('[1..3, [null]] == [1..3, [null]];')).toBe(true);
  });

  it('compares functions by identity', () => {
    expect(run('var f = || { }; var g = f; [f == g, f == || { }];')).toEqual([true, false]);
  });

  describe('logic', () => {
    it('short-circuits and/or', () => {
      expect(run('false and missing;')).toBe(false);
      expect(run('true or missing;')).toBe(true);
    });

    it('evaluates xor', () => {
      expect(run('[true xor true, true xor false];')).toEqual([false, true]);
    });

    it('requires boolean operands', () => {
      const err = runError('true and 1;');
      expect(err.message).toBe("cannot determine truthiness of value of type 'number' at 1:10");
    });

    it('negates booleans only', () => {
      expect(run('!false;')).toBe(true);
      expect(runError('!"";').toData().message).toBe(
        "cannot determine truthiness of value of type 'string'"
      );
    });
  });
});

describe('Forge Language: clone and mirror', () => {
  it('gives a clone independent storage', () => {
    const source = `
      var a = [[1], ["k": [2]]];
      var b = clone a;
      b[0][0] = 9;
      b[1]["k"][0] = 8;
    `;
    expect(runOutput(`${source} print a; print b;`)).toEqual([
      '[[1], ["k": [2]]]',
      '[[9], ["k": [8]]]',
    ]);
  });

  it('leaves the clone untouched when the original changes', () => {
    expect(run('var a = [1, 2]; var b = clone a; a[0] = 5; b;')).toEqual([1, 2]);
  });

  it('shares storage through a mirror', () => {
    expect(run('var a = [1]; var m = mirror a; m[0] = 5; a;')).toEqual([5]);
  });

  it('mirrors maps both ways', () => {
    const source = `
      var a = ["x": 1];
      var m = mirror a;
      m["y"] = 2;
      a["z"] = 3;
      [a.len, m.len];
    `;
    expect(run(source)).toEqual([3, 3]);
  });

  it('clones a slice of a list', () => {
    expect(run('var xs = [1, 2, 3]; var ys = clone xs[1..3]; ys[0] = 0; [xs, ys];')).toEqual([
      [1, 2, 3],
      [0, 3],
    ]);
  });
});

describe('Forge Language: conversions', () => {
  it('converts to number', () => {
    expect(run('"42" as number + 1;')).toBe(43);
    expect(run('" 2.5 " as number;')).toBe(2.5);
    expect(run('true as number;')).toBe(1);
    expect(run("'A' as number;")).toBe(65);
  });

  it('converts any value to its printed string', () => {
    expect(run('[1, "a"] as string;')).toBe('[1, "a"]');
    expect(run('3 as string + "!";')).toBe('3!');
  });

  it('converts to char', () => {
    expect(run("97 as char == 'a';")).toBe(true);
    expect(run('"z" as char == \'z\';')).toBe(true);
  });

  it('converts to bool', () => {
    expect(run('"false" as bool;')).toBe(false);
  });

  it('converts sequences to list', () => {
    expect(run("(\"ab\" as list) == ['a', 'b'];")).toBe(true);
    expect(run('(0..3) as list;')).toEqual([0, 1, 2]);
    expect(run('["k": 1] as list;')).toEqual([['k', 1]]);
  });

  it('copies a list on conversion', () => {
    expect(run('var a = [1, 2]; var b = a as list; b[0] = 9; a;')).toEqual([1, 2]);
  });

  it('rejects a string that is not a numeral', () => {
    const err = runError('"12abc" as number;');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe('cannot convert string "12abc" to number');
  });

  it('rejects a string that is not a bool', () => {
    const err = runError('"yes" as bool;');
    expect(err.toData().message).toBe('cannot convert string "yes" to bool');
  });

  it('rejects null as a list', () => {
    const err = runError('null as list;');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe("cannot convert value of type 'null' to list");
  });

  it('rejects a number that is not a code point', () => {
    const err = runError('1.5 as char;');
    expect(err.toData().message).toBe("cannot convert value of type 'number' to char");
  });
});

describe('Forge Language: printing', () => {
  it('prints scalars', () => {
    expect(runOutput('print 1.5; print true; print null; print "raw"; print \'c\';')).toEqual([
      '1.5',
      'true',
      'null',
      'raw',
      'c',
    ]);
  });

  it('quotes strings and chars inside containers', () => {
    expect(runOutput("print [1, \"a\", 'c', [:], 1..3];")).toEqual([
      "[1, \"a\", 'c', [:], 1..3]",
    ]);
  });

  it('prints maps as key: value pairs', () => {
    expect(runOutput('print ["a": [1], 2: null];')).toEqual(['["a": [1], 2: null]']);
  });

  it('escapes control characters inside containers', () => {
    expect(runOutput('print ["a\\tb"];')).toEqual(['["a\\tb"]']);
  });

  it('marks a list that contains itself', () => {
    expect(runOutput('var xs = [1]; xs[1..1] = [xs]; print xs;')).toEqual(['[1, [...]]']);
  });
});
