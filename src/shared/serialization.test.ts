/**
 * Value Codec Tests
 *
 * Runs against a real QuickJS context
 */

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import { InvariantError, UnsupportedValueError } from '../host/engine/types';
import { type JSEngineContext, type JSEngineRuntime, QuickJSProvider } from '../sandbox';
import { ValueCodec } from './serialization';
import type { NativeList, NativeMap, NativeValue } from './types';

describe('ValueCodec', () => {
  let runtime: JSEngineRuntime;
  let context: JSEngineContext<null>;
  let codec: ValueCodec;

  beforeAll(async () => {
    runtime = await new QuickJSProvider().createRuntime();
  });

  afterAll(() => {
    runtime.dispose();
  });

  beforeEach(() => {
    context = runtime.createContext(null);
    codec = new ValueCodec(context);
  });

  afterEach(() => {
    codec.dispose();
    context.dispose();
  });

  const roundTrip = (value: NativeValue): NativeValue => {
    const handle = codec.encode(value);
    try {
      return codec.decode(handle);
    } finally {
      context.release(handle);
    }
  };

  /** Evaluate an expression and decode its value */
  const evalDecode = (code: string): NativeValue => {
    const outcome = context.eval(code);
    if (!outcome.ok) {
      context.release(outcome.error);
      throw new Error(`eval failed: ${code}`);
    }
    try {
      return codec.decode(outcome.value);
    } finally {
      context.release(outcome.value);
    }
  };

  describe('round trip', () => {
    test('should preserve primitives', () => {
      expect(roundTrip(true)).toBe(true);
      expect(roundTrip(false)).toBe(false);
      expect(roundTrip(3.5)).toBe(3.5);
      expect(roundTrip('text')).toBe('text');
      expect(roundTrip(null)).toBeNull();
      expect(roundTrip(undefined)).toBeUndefined();
    });

    test('should preserve lists', () => {
      const list: NativeList = [1, 'two', [false, null]];
      expect(roundTrip(list)).toEqual(list);
    });

    test('should preserve maps and their key order', () => {
      const map: NativeMap = new Map<string, NativeValue>([
        ['zeta', 1],
        ['alpha', new Map<string, NativeValue>([['inner', 'x']])],
        ['mid', [1, 2]],
      ]);
      const decoded = roundTrip(map);

      expect(decoded).toEqual(map);
      expect(decoded instanceof Map && Array.from(decoded.keys())).toEqual([
        'zeta',
        'alpha',
        'mid',
      ]);
    });

    test('should keep a __proto__ key as a plain entry', () => {
      const map: NativeMap = new Map<string, NativeValue>([
        ['__proto__', new Map<string, NativeValue>([['a', 1]])],
        ['b', 2],
      ]);
      const decoded = roundTrip(map);

      expect(decoded).toEqual(map);
      expect(decoded instanceof Map && Array.from(decoded.keys())).toEqual(['__proto__', 'b']);
    });

    test('should allow the same value twice in one structure', () => {
      const shared: NativeList = [1];
      expect(roundTrip([shared, shared])).toEqual([[1], [1]]);
    });
  });

  describe('decode()', () => {
    test('should re-key array-like objects as strings', () => {
      expect(evalDecode("({ 0: 'a', 1: 'b' })")).toEqual(
        new Map([
          ['0', 'a'],
          ['1', 'b'],
        ])
      );
    });

    test('should decode arrays as lists', () => {
      expect(evalDecode("[1, 'a', null, undefined]")).toEqual([1, 'a', null, undefined]);
    });

    test('should reject functions and symbols', () => {
      expect(() => evalDecode('(function () {})')).toThrow(UnsupportedValueError);
      expect(() => evalDecode("Symbol('s')")).toThrow(UnsupportedValueError);
    });

    test('should reject arrays with an oversized length', () => {
      expect(() =>
        evalDecode('(function () { var a = []; a.length = 4294967295; return a; })()')
      ).toThrow(UnsupportedValueError);
    });

    test('should reject objects nested too deeply', () => {
      expect(() => evalDecode('(function () { var o = {}; o.self = o; return o; })()')).toThrow(
        InvariantError
      );
    });
  });

  describe('encode()', () => {
    test('should reject circular input', () => {
      const list: NativeList = [];
      list.push(list);
      expect(() => codec.encode(list)).toThrow(UnsupportedValueError);
    });

    test('should leave no handles behind after a failed encode', () => {
      const before = context.openHandleCount;
      const list: NativeList = ['a', new Map<string, NativeValue>([['k', 1]])];
      list.push(list);
      expect(() => codec.encode(list)).toThrow(UnsupportedValueError);
      expect(context.openHandleCount).toBe(before);
    });
  });

  describe('decodeArgument()', () => {
    test('should accept strings, numbers and booleans only', () => {
      const handles = [context.newString('x'), context.newNumber(2), context.newBoolean(true)];
      expect(handles.map((handle) => codec.decodeArgument(handle))).toEqual(['x', 2, true]);

      const object = context.newObject();
      expect(() => codec.decodeArgument(object)).toThrow(UnsupportedValueError);
      expect(() => codec.decodeArgument(context.null)).toThrow(UnsupportedValueError);
      for (const handle of [...handles, object]) context.release(handle);
    });
  });

  describe('describeError()', () => {
    test('should describe Error objects with their name and message first', () => {
      const outcome = context.eval("throw new Error('boom')");
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;

      const description = codec.describeError(outcome.error);
      context.release(outcome.error);

      expect(description.split('\n')[0]).toBe('Error: boom');
    });

    test('should coerce other thrown values to strings', () => {
      const outcome = context.eval("throw 'plain failure'");
      if (outcome.ok) throw new Error('expected a failure');

      expect(codec.describeError(outcome.error)).toBe('plain failure');
      context.release(outcome.error);
    });

    test('should keep handle counts balanced', () => {
      const error = context.newString('x');
      const before = context.openHandleCount;
      codec.describeError(error);
      expect(context.openHandleCount).toBe(before);
      context.release(error);
    });
  });

  test('should refuse to decode after dispose', () => {
    codec.dispose();
    expect(() => codec.decode(context.undefined)).toThrow(InvariantError);
    expect(() => codec.describeError(context.undefined)).toThrow(InvariantError);
  });
});
