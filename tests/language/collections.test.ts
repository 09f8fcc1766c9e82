/**
 * Forge Language Tests: Lists, Strings and Maps
 * Indexing, slicing, splice assignment and map keys.
 */

import { describe, expect, it } from 'vitest';
import { char, FORGE_ERROR_CODES, ForgeMap } from '../../src/index.js';
import { run, runError, runOutput } from '../helpers/runtime.js';

describe('Forge Language: lists', () => {
  it('splices a longer replacement into a slice', () => {
    const source = `
      var L = [0, 1, 2, 3];
      L[1..3] = ["a", "b", "c", "d", "e"];
      L;
    `;
    expect(run(source)).toEqual([0, 'a', 'b', 'c', 'd', 'e', 3]);
  });

  it('compares a spliced list with ==', () => {
    const source = `
      var L = [0, 1, 2, 3];
      L[1..3] = ["a", "b", "c", "d", "e"];
      L == [0, "a", "b", "c", "d", "e", 3];
    `;
    expect(run(source)).toBe(true);
  });

  it('splices a shorter replacement, shrinking the list', () => {
    expect(run('var L = [1, 2, 3, 4, 5]; L[1..4] = [9]; L;')).toEqual([1, 9, 5]);
  });

  it('appends by splicing at the end', () => {
    expect(run('var L = [1]; L[1..1] = [2, 3]; L;')).toEqual([1, 2, 3]);
  });

  it('splices the items of a range', () => {
    expect(run('var L = [0, 0]; L[0..1] = 5..8; L;')).toEqual([5, 6, 7, 0]);
  });

  it('splices a replacement of many items', () => {
    expect(run('var big = [0; 200000]; var L = [1, 2]; L[0..1] = big; L.len;')).toBe(200001);
    expect(run('var big = [7; 200000]; var L = [1, 2]; L[0..1] = big; L[200000];')).toBe(2);
  });

  it('clamps the end of a slice to the length', () => {
    expect(run('[1, 2, 3][1..10];')).toEqual([2, 3]);
  });

  it('rejects a slice that starts past the end', () => {
    const err = runError('[1, 2][3..4];');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_INDEX_OUT_OF_BOUNDS);
    expect(err.toData().message).toBe('slice start 3 out of bounds for list of length 2');
  });

  it('rejects an index past the end', () => {
    const err = runError('var xs = [1, 2];\nxs[2];');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_INDEX_OUT_OF_BOUNDS);
    expect(err.message).toBe('index 2 out of bounds for list of length 2 at 2:4');
    expect(err.context).toEqual({ index: 2, length: 2 });
  });

  it('rejects a negative index', () => {
    const err = runError('[1, 2][-1];');
    expect(err.toData().message).toBe('index -1 out of bounds for list of length 2');
  });

  it('rejects a fractional index', () => {
    const err = runError('[1][0.5];');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe('index must be an integer, found 0.5');
  });

  it('assigns into nested lists', () => {
    expect(run('var g = [[1, 2], [3]]; g[0][1] = 7; g;')).toEqual([[1, 7], [3]]);
  });

  it('builds independent rows with a repeat literal', () => {
    expect(run('var g = [[0]; 2]; g[0][0] = 1; g;')).toEqual([[1], [0]]);
  });

  it('rejects a negative repeat count', () => {
    const err = runError('[0; -1];');
    expect(err.toData().message).toBe('repeat count must be a non-negative integer, found -1');
  });

  it('concatenates two lists into a new list', () => {
    expect(run('var a = [1]; var b = a + [2]; a[0] = 5; b;')).toEqual([1, 2]);
  });

  it('reports list length', () => {
    expect(run('[1, 2, 3].len;')).toBe(3);
  });
});

describe('Forge Language: strings', () => {
  it('slices a string', () => {
    expect(run('"Hello, world!"[7..12];')).toBe('world');
  });

  it('splices a replacement into a string variable', () => {
    const source = `
      var test = "An apple is what I am eating";
      test[3..8] = "pear";
      test;
    `;
    expect(run(source)).toBe('An pear is what I am eating');
  });

  it('splices into the string as it is after the right-hand side runs', () => {
    const source = `
      var s = "abc";
      var f = || { s = "xyz"; return "Q"; };
      s[0..1] = f();
      s;
    `;
    expect(run(source)).toBe('Qyz');
  });

  it('replaces a character of the string as it is after the right-hand side runs', () => {
    const source = `
      var s = "abc";
      var f = || { s = "xyz"; return 'Q'; };
      s[1] = f();
      s;
    `;
    expect(run(source)).toBe('xQz');
  });

  it('reads one character as a char', () => {
    expect(run('"abc"[1];')).toEqual(char('b'));
  });

  it('replaces one character', () => {
    expect(run("var s = \"cat\"; s[0] = 'b'; s;")).toBe('bat');
  });

  it('keeps value semantics across bindings', () => {
    expect(runOutput("var s = \"ab\"; var t = s; t[0] = 'z'; print s; print t;")).toEqual([
      'ab',
      'zb',
    ]);
  });

  it('indexes by code point', () => {
    expect(run('"é😀x"[1];')).toEqual(char('😀'));
    expect(run('"é😀x".len;')).toBe(3);
  });

  it('rejects a multi-character element', () => {
    const err = runError('var s = "ab"; s[0] = "xy";');
    expect(err.toData().message).toBe(
      "string element must be a single character, found value of type 'string'"
    );
  });

  it('refuses to assign into a string literal', () => {
    const err = runError("\"ab\"[0] = 'c';");
    expect(err.toData().message).toBe('cannot assign into a temporary string');
  });

  it('concatenates strings and chars', () => {
    expect(run("\"ab\" + 'c' + \"d\";")).toBe('abcd');
    expect(run("'x' + 'y';")).toBe('xy');
  });

  it('orders strings by code point', () => {
    expect(run('"apple" < "banana";')).toBe(true);
    expect(run('"Z" < "a";')).toBe(true);
  });
});

describe('Forge Language: maps', () => {
  it('reads and writes entries', () => {
    expect(run('var m = ["a": 1]; m["b"] = 2; m["a"] + m["b"];')).toBe(3);
  });

  it('keeps insertion order for keys and values', () => {
    const source = `
      var m = [:];
      m["z"] = 1;
      m["a"] = 2;
      m["z"] = 3;
      [m.keys, m.values, m.len];
    `;
    expect(run(source)).toEqual([['z', 'a'], [3, 2], 2]);
  });

  it('matches list keys structurally', () => {
    expect(run('var m = [[1, 2]: "pair"]; m[[1, 2]];')).toBe('pair');
  });

  it('keeps chars and strings as distinct keys', () => {
    expect(run("var m = [\"a\": 1, 'a': 2]; m.len;")).toBe(2);
  });

  it('compares maps regardless of order', () => {
    expect(run('["a": 1, "b": 2] == ["b": 2, "a": 1];')).toBe(true);
    expect(run('["a": 1] == ["a": 2];')).toBe(false);
  });

  it('reports a missing key', () => {
    const err = runError('var m = ["a": 1];\nm["b"];');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_INDEX_OUT_OF_BOUNDS);
    expect(err.toData().message).toBe('no entry for key "b" in map');
    expect(err.location).toEqual({ line: 2, column: 3, offset: 20 });
  });

  it('builds a ForgeMap value', () => {
    const value = run('[1: "one"];');
    if (!(value instanceof ForgeMap)) throw new Error('expected a map');
    expect(value.entries()).toEqual([[1, 'one']]);
  });

  it('has no order for iteration', () => {
    const err = runError('for k in ["a": 1] { }');
    expect(err.code).toBe(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe("cannot iterate over value of type 'map'");
  });
});
