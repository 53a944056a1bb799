/**
 * @blueprint/shared - Value Codec
 *
 * Converts between native values and handles inside an evaluation context.
 * - encode: NativeValue → script value
 * - decode: script value → NativeValue
 *
 * Object keys always decode as strings, so an array-like object comes back as a
 * map keyed "0", "1", … rather than as a list.
 */

import { InvariantError, UnsupportedValueError } from '../host/engine/types';
import type { JSEngineContext, ScriptHandle } from '../sandbox';
import type { NativeArgument, NativeList, NativeMap, NativeValue } from './types';

/** Kind names produced by the in-context classifier */
type ScriptValueKind =
  | 'null'
  | 'undefined'
  | 'boolean'
  | 'number'
  | 'string'
  | 'array'
  | 'error'
  | 'object'
  | 'function'
  | 'symbol'
  | 'bigint';

const CLASSIFY_SOURCE = `(function (value) {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Error) return 'error';
  return typeof value;
})`;

const KEYS_SOURCE = `(function (value) {
  return Object.keys(value);
})`;

// Plain assignment would run the `__proto__` setter instead of storing the key
const DEFINE_SOURCE = `(function (target, key, value) {
  Object.defineProperty(target, key, {
    value: value,
    enumerable: true,
    writable: true,
    configurable: true
  });
})`;

const DESCRIBE_SOURCE = `(function (value) {
  try {
    if (value instanceof Error) {
      var head = String(value);
      var stack = typeof value.stack === 'string' ? value.stack : '';
      if (!stack) return head;
      return stack.indexOf(head) === 0 ? stack : head + '\\n' + stack;
    }
    return String(value);
  } catch (e) {
    return '[unprintable value]';
  }
})`;

const MAX_DEPTH = 64;

/** Longest array the codec decodes; array lengths are script-controlled */
const MAX_LIST_LENGTH = 1 << 16;

interface CodecHelpers {
  classify: ScriptHandle;
  keys: ScriptHandle;
  define: ScriptHandle;
  describe: ScriptHandle;
}

export class ValueCodec {
  private readonly context: JSEngineContext;
  private helpers: CodecHelpers | null;

  constructor(context: JSEngineContext) {
    this.context = context;
    this.helpers = {
      classify: this.compileHelper(CLASSIFY_SOURCE),
      keys: this.compileHelper(KEYS_SOURCE),
      define: this.compileHelper(DEFINE_SOURCE),
      describe: this.compileHelper(DESCRIBE_SOURCE),
    };
  }

  /**
   * Encode a native value. The caller owns the returned handle.
   */
  encode(value: NativeValue): ScriptHandle {
    return this.encodeValue(value, new WeakSet());
  }

  private encodeValue(value: NativeValue, seen: WeakSet<object>): ScriptHandle {
    const ctx = this.context;

    if (value === null) return ctx.null;
    if (value === undefined) return ctx.undefined;

    switch (typeof value) {
      case 'boolean':
        return ctx.newBoolean(value);
      case 'number':
        return ctx.newNumber(value);
      case 'string':
        return ctx.newString(value);
    }

    if (typeof value === 'object') {
      if (seen.has(value)) {
        throw new UnsupportedValueError('circular');
      }
      seen.add(value);
    }

    if (Array.isArray(value)) {
      const array = ctx.newArray();
      try {
        value.forEach((element, index) => {
          this.withHandle(this.encodeValue(element, seen), (handle) =>
            ctx.setProp(array, index, handle)
          );
        });
      } catch (error) {
        ctx.release(array);
        throw error;
      } finally {
        seen.delete(value);
      }
      return array;
    }

    if (value instanceof Map) {
      const object = ctx.newObject();
      try {
        for (const [key, element] of value) {
          this.withHandle(this.encodeValue(element, seen), (handle) =>
            this.defineEntry(object, key, handle)
          );
        }
      } catch (error) {
        ctx.release(object);
        throw error;
      } finally {
        seen.delete(value);
      }
      return object;
    }

    throw new UnsupportedValueError(describeHostType(value));
  }

  /**
   * Decode a script value. The handle stays owned by the caller.
   */
  decode(handle: ScriptHandle): NativeValue {
    return this.decodeValue(handle, 0);
  }

  private decodeValue(handle: ScriptHandle, depth: number): NativeValue {
    const ctx = this.context;
    if (depth > MAX_DEPTH) {
      throw new InvariantError(`Value nesting exceeds ${MAX_DEPTH} levels`);
    }
    const kind = this.classify(handle);

    switch (kind) {
      case 'null':
        return null;
      case 'undefined':
        return undefined;
      case 'boolean':
        return ctx.getBoolean(handle);
      case 'number':
        return ctx.getNumber(handle);
      case 'string':
        return ctx.getString(handle);
      case 'array': {
        const list: NativeList = [];
        const length = this.withHandle(ctx.getProp(handle, 'length'), (h) => ctx.getNumber(h));
        if (length > MAX_LIST_LENGTH) {
          throw new UnsupportedValueError(`array of length ${length}`);
        }
        for (let i = 0; i < length; i++) {
          list.push(this.withHandle(ctx.getProp(handle, i), (h) => this.decodeValue(h, depth + 1)));
        }
        return list;
      }
      case 'error':
      case 'object': {
        const map: NativeMap = new Map();
        for (const key of this.ownKeys(handle)) {
          map.set(
            key,
            this.withHandle(ctx.getProp(handle, key), (h) => this.decodeValue(h, depth + 1))
          );
        }
        return map;
      }
      default:
        throw new UnsupportedValueError(kind);
    }
  }

  /**
   * Decode an argument passed to a registered native method.
   * Only strings, numbers and booleans are accepted.
   */
  decodeArgument(handle: ScriptHandle): NativeArgument {
    const kind = this.classify(handle);
    switch (kind) {
      case 'string':
        return this.context.getString(handle);
      case 'number':
        return this.context.getNumber(handle);
      case 'boolean':
        return this.context.getBoolean(handle);
      default:
        throw new UnsupportedValueError(kind);
    }
  }

  /**
   * Printable description of a thrown value: the stack trace for Error objects,
   * the string coercion otherwise.
   */
  describeError(handle: ScriptHandle): string {
    const helpers = this.requireHelpers();
    const outcome = this.context.call(helpers.describe, this.context.undefined, [handle]);
    if (!outcome.ok) {
      this.context.release(outcome.error);
      return '[unprintable value]';
    }
    return this.withHandle(outcome.value, (h) => this.context.getString(h));
  }

  /**
   * Release the helper functions. The codec is unusable afterwards.
   */
  dispose(): void {
    if (!this.helpers) return;
    if (!this.context.disposed) {
      this.context.release(this.helpers.classify);
      this.context.release(this.helpers.keys);
      this.context.release(this.helpers.define);
      this.context.release(this.helpers.describe);
    }
    this.helpers = null;
  }

  private classify(handle: ScriptHandle): ScriptValueKind {
    const helpers = this.requireHelpers();
    const outcome = this.context.call(helpers.classify, this.context.undefined, [handle]);
    if (!outcome.ok) {
      this.context.release(outcome.error);
      throw new InvariantError('Value classification failed');
    }
    const kind = this.withHandle(outcome.value, (h) => this.context.getString(h));
    if (!isScriptValueKind(kind)) {
      throw new UnsupportedValueError(kind);
    }
    return kind;
  }

  private defineEntry(target: ScriptHandle, key: string, value: ScriptHandle): void {
    const ctx = this.context;
    const helpers = this.requireHelpers();
    const keyHandle = ctx.newString(key);
    try {
      const outcome = ctx.call(helpers.define, ctx.undefined, [target, keyHandle, value]);
      if (!outcome.ok) {
        ctx.release(outcome.error);
        throw new InvariantError(`Could not define key "${key}"`);
      }
      ctx.release(outcome.value);
    } finally {
      ctx.release(keyHandle);
    }
  }

  private ownKeys(handle: ScriptHandle): string[] {
    const ctx = this.context;
    const helpers = this.requireHelpers();
    const outcome = ctx.call(helpers.keys, ctx.undefined, [handle]);
    if (!outcome.ok) {
      ctx.release(outcome.error);
      throw new InvariantError('Key enumeration failed');
    }
    return this.withHandle(outcome.value, (keys) => {
      const length = this.withHandle(ctx.getProp(keys, 'length'), (h) => ctx.getNumber(h));
      const result: string[] = [];
      for (let i = 0; i < length; i++) {
        result.push(this.withHandle(ctx.getProp(keys, i), (h) => ctx.getString(h)));
      }
      return result;
    });
  }

  private compileHelper(source: string): ScriptHandle {
    const outcome = this.context.eval(source, 'codec.js');
    if (!outcome.ok) {
      this.context.release(outcome.error);
      throw new InvariantError('Failed to compile codec helper');
    }
    return outcome.value;
  }

  private requireHelpers(): CodecHelpers {
    if (!this.helpers) {
      throw new InvariantError('Value codec used after dispose');
    }
    return this.helpers;
  }

  private withHandle<T>(handle: ScriptHandle, use: (handle: ScriptHandle) => T): T {
    try {
      return use(handle);
    } finally {
      this.context.release(handle);
    }
  }
}

const SCRIPT_VALUE_KINDS: ReadonlySet<string> = new Set<ScriptValueKind>([
  'null',
  'undefined',
  'boolean',
  'number',
  'string',
  'array',
  'error',
  'object',
  'function',
  'symbol',
  'bigint',
]);

function isScriptValueKind(kind: string): kind is ScriptValueKind {
  return SCRIPT_VALUE_KINDS.has(kind);
}

function describeHostType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
