/**
 * Script Bridge
 *
 * Owns one evaluation context and everything bound to it: the value codec, the
 * `__BlueprintNative__` namespace and the script-visible console. All host → script
 * calls go through here; script failures are described, logged and reported,
 * never thrown back at the host.
 */

import type { JSEngineContext, JSEngineRuntime, ScriptHandle } from '../../sandbox';
import {
  type MethodRegistry,
  type NativeMethod,
  type NativeValue,
  ROOT_VIEW_ID,
  ValueCodec,
  type ViewId,
} from '../../shared';
import {
  InvariantError,
  type Logger,
  type MetricReporter,
  type ScriptErrorEvent,
  type ScriptErrorSource,
} from '../engine/types';
import type { TreeManager } from '../TreeManager';

/** Global the script reads native functions from and installs its dispatchers on */
export const NATIVE_NAMESPACE = '__BlueprintNative__';

/** Global the tick calls */
export const SCHEDULER_INTERRUPT = '__schedulerInterrupt__';

/** Upper bound on job-queue drains after a single script call */
const MAX_JOB_FLUSHES = 100;

/**
 * Host user data carried by the evaluation context
 */
export interface BridgeHost {
  readonly tree: TreeManager;
  readonly methods: MethodRegistry;
}

export type EvaluateResult = { ok: true } | { ok: false; error: string };

export interface ScriptBridgeOptions {
  debug?: boolean;
  logger?: Logger;
  onScriptError?: (event: ScriptErrorEvent) => void;
  onMetric?: MetricReporter;
}

type HostImpl = (args: ScriptHandle[]) => ScriptHandle | undefined;

export class ScriptBridge {
  readonly context: JSEngineContext<BridgeHost>;
  readonly codec: ValueCodec;
  private readonly logger: Logger;
  private readonly opts: Required<Pick<ScriptBridgeOptions, 'debug'>> &
    Omit<ScriptBridgeOptions, 'debug' | 'logger'>;
  private depth = 0;
  private warnedMissing = new Set<string>();
  private disposed = false;

  constructor(runtime: JSEngineRuntime, host: BridgeHost, options: ScriptBridgeOptions = {}) {
    this.logger = options.logger ?? console;
    this.opts = {
      debug: options.debug ?? false,
      onScriptError: options.onScriptError,
      onMetric: options.onMetric,
    };
    this.context = runtime.createContext(host);
    this.codec = new ValueCodec(this.context);
    const namespace = this.context.newObject();
    this.context.setProp(this.context.global, NATIVE_NAMESPACE, namespace);
    this.context.release(namespace);
    this.installNativeApi();
    this.installConsole();
  }

  // Reason: Debug logger accepts arbitrary arguments
  private log(...args: unknown[]): void {
    if (this.opts.debug) {
      this.logger.log('[blueprint:ScriptBridge]', ...args);
    }
  }

  /**
   * True while script code is running
   */
  get busy(): boolean {
    return this.depth > 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================
  // Native namespace
  // ============================================

  private installNativeApi(): void {
    const tree = (): TreeManager => this.context.host.tree;

    this.defineNative('createViewInstance', (args) => {
      const typeId = this.stringArg(args, 0, 'createViewInstance');
      return this.context.newNumber(tree().createInstance(typeId));
    });

    this.defineNative('createTextViewInstance', (args) => {
      const text = this.stringArg(args, 0, 'createTextViewInstance');
      return this.context.newNumber(tree().createTextInstance(text));
    });

    this.defineNative('setViewProperty', (args) => {
      const viewId = this.viewIdArg(args, 0, 'setViewProperty');
      const key = this.stringArg(args, 1, 'setViewProperty');
      const value = this.codec.decode(this.requireArg(args, 2, 'setViewProperty'));
      tree().setProperty(viewId, key, value);
      return undefined;
    });

    this.defineNative('setRawTextValue', (args) => {
      const viewId = this.viewIdArg(args, 0, 'setRawTextValue');
      const text = this.stringArg(args, 1, 'setRawTextValue');
      tree().setRawText(viewId, text);
      return undefined;
    });

    this.defineNative('addChild', (args) => {
      const parentId = this.viewIdArg(args, 0, 'addChild');
      const childId = this.viewIdArg(args, 1, 'addChild');
      const index = this.optionalIndexArg(args, 2, 'addChild');
      tree().addChild(parentId, childId, index);
      return undefined;
    });

    this.defineNative('removeChild', (args) => {
      const parentId = this.viewIdArg(args, 0, 'removeChild');
      const childId = this.viewIdArg(args, 1, 'removeChild');
      tree().removeChild(parentId, childId);
      return undefined;
    });

    this.defineNative('getRootInstanceId', () => this.context.newNumber(ROOT_VIEW_ID));
  }

  /**
   * Expose a registered host closure as `__BlueprintNative__[name]`.
   * The wrapper only knows `index`; the closure is resolved through the
   * method registry of the context's host on every call.
   */
  bindNativeMethod(name: string, index: number): void {
    this.defineNative(name, (args) => {
      const decoded = args.map((arg) => this.codec.decodeArgument(arg));
      this.context.host.methods.invoke(index, decoded);
      return undefined;
    });
  }

  /**
   * Register `fn` with the host's method registry and expose it to the script
   */
  registerNativeMethod(name: string, fn: NativeMethod): number {
    const index = this.context.host.methods.register(name, fn);
    this.bindNativeMethod(name, index);
    this.log('registerNativeMethod', name, '->', index);
    return index;
  }

  private defineNative(name: string, impl: HostImpl): void {
    const fn = this.context.newFunction(name, (args) => {
      try {
        return impl(args);
      } catch (error) {
        // Rethrown errors surface in the script as exceptions
        this.log(`${NATIVE_NAMESPACE}.${name} rejected call:`, error);
        throw error;
      }
    });
    try {
      this.withNamespace((namespace) => {
        if (!namespace) {
          throw new InvariantError(`Cannot define ${name}: ${NATIVE_NAMESPACE} is not an object`);
        }
        this.context.setProp(namespace, name, fn);
      });
    } finally {
      this.context.release(fn);
    }
  }

  /**
   * Run `use` with the current `__BlueprintNative__` global, which the script may
   * have replaced; null when it is not an object
   */
  private withNamespace<T>(use: (namespace: ScriptHandle | null) => T): T {
    const ctx = this.context;
    const namespace = ctx.getProp(ctx.global, NATIVE_NAMESPACE);
    try {
      const type = ctx.typeOf(namespace);
      return use(type === 'object' || type === 'function' ? namespace : null);
    } finally {
      ctx.release(namespace);
    }
  }

  private requireArg(args: ScriptHandle[], index: number, fnName: string): ScriptHandle {
    const arg = args[index];
    if (arg === undefined) {
      throw new InvariantError(`${fnName}: missing argument ${index}`);
    }
    return arg;
  }

  private stringArg(args: ScriptHandle[], index: number, fnName: string): string {
    const value = this.codec.decodeArgument(this.requireArg(args, index, fnName));
    if (typeof value !== 'string') {
      throw new InvariantError(`${fnName}: argument ${index} must be a string`);
    }
    return value;
  }

  private viewIdArg(args: ScriptHandle[], index: number, fnName: string): ViewId {
    const value = this.codec.decodeArgument(this.requireArg(args, index, fnName));
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw new InvariantError(`${fnName}: argument ${index} must be a view id`);
    }
    return value;
  }

  private optionalIndexArg(
    args: ScriptHandle[],
    index: number,
    fnName: string
  ): number | undefined {
    const arg = args[index];
    if (arg === undefined) return undefined;
    const value = this.codec.decode(arg);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new InvariantError(`${fnName}: argument ${index} must be an integer index`);
    }
    return value;
  }

  // ============================================
  // Console
  // ============================================

  private installConsole(): void {
    const ctx = this.context;
    const consoleObject = ctx.newObject();
    const levels: Array<[string, (...args: unknown[]) => void]> = [
      ['log', (...args) => this.logger.log('[blueprint:script]', ...args)],
      ['info', (...args) => this.logger.log('[blueprint:script]', ...args)],
      [
        'debug',
        (...args) => {
          if (this.opts.debug) this.logger.log('[blueprint:script]', ...args);
        },
      ],
      ['warn', (...args) => this.logger.warn('[blueprint:script]', ...args)],
      ['error', (...args) => this.logger.error('[blueprint:script]', ...args)],
    ];
    for (const [level, write] of levels) {
      const fn = ctx.newFunction(level, (args) => {
        write(...args.map((arg) => this.codec.describeError(arg)));
        return undefined;
      });
      ctx.setProp(consoleObject, level, fn);
      ctx.release(fn);
    }
    ctx.setProp(ctx.global, 'console', consoleObject);
    ctx.release(consoleObject);
  }

  // ============================================
  // Host → script
  // ============================================

  /**
   * Evaluate a script in the context
   */
  evaluate(code: string, filename = 'bundle.js'): EvaluateResult {
    this.assertAlive('evaluate');
    const start = Date.now();
    const outcome = this.run(() => this.context.eval(code, filename));
    let result: EvaluateResult;
    if (outcome.ok) {
      this.context.release(outcome.value);
      result = { ok: true };
    } else {
      result = { ok: false, error: this.reportScriptError('evaluate', outcome.error) };
    }
    this.flushJobs();
    this.opts.onMetric?.('bridge.evaluate', Date.now() - start, {
      size: code.length,
      ok: result.ok,
    });
    return result;
  }

  /**
   * Call `__BlueprintNative__.dispatchViewEvent(viewId, eventType, ...args)`
   */
  dispatchViewEvent(viewId: ViewId, eventType: string, args: readonly NativeValue[] = []): boolean {
    return this.dispatch('dispatchViewEvent', [viewId, eventType, ...args]);
  }

  /**
   * Call `__BlueprintNative__.dispatchEvent(eventType, ...args)`
   */
  dispatchEvent(eventType: string, args: readonly NativeValue[] = []): boolean {
    return this.dispatch('dispatchEvent', [eventType, ...args]);
  }

  /**
   * Call a global function with no arguments. Returns whether it ran to completion.
   */
  callGlobal(name: string, source: ScriptErrorSource = 'tick'): boolean {
    this.assertAlive('callGlobal');
    const ctx = this.context;
    const fn = ctx.getProp(ctx.global, name);
    try {
      if (ctx.typeOf(fn) !== 'function') {
        this.warnMissing(name);
        return false;
      }
      const outcome = this.run(() => ctx.call(fn, ctx.undefined, []));
      if (!outcome.ok) {
        this.reportScriptError(source, outcome.error);
        return false;
      }
      ctx.release(outcome.value);
      return true;
    } finally {
      ctx.release(fn);
      this.flushJobs();
    }
  }

  private dispatch(fnName: string, args: readonly NativeValue[]): boolean {
    this.assertAlive(fnName);
    const ctx = this.context;
    const start = Date.now();
    const encoded: ScriptHandle[] = [];
    const fn = this.withNamespace((namespace) =>
      namespace ? ctx.getProp(namespace, fnName) : ctx.undefined
    );
    try {
      if (ctx.typeOf(fn) !== 'function') {
        this.warnMissing(`${NATIVE_NAMESPACE}.${fnName}`);
        return false;
      }
      for (const arg of args) {
        encoded.push(this.codec.encode(arg));
      }
      const outcome = this.run(() => ctx.call(fn, ctx.undefined, encoded));
      if (!outcome.ok) {
        this.reportScriptError('dispatch', outcome.error);
        return false;
      }
      ctx.release(outcome.value);
      return true;
    } catch (error) {
      // Host-side failure, e.g. an argument the codec cannot marshal
      this.logger.error(`[blueprint:ScriptBridge] ${fnName} failed:`, error);
      return false;
    } finally {
      for (const handle of encoded) ctx.release(handle);
      ctx.release(fn);
      this.flushJobs();
      this.opts.onMetric?.('bridge.dispatch', Date.now() - start, { fn: fnName });
    }
  }

  /**
   * Drain the promise job queue, reporting every failing job
   */
  flushJobs(): void {
    if (this.disposed) return;
    for (let i = 0; i < MAX_JOB_FLUSHES; i++) {
      const error = this.run(() => this.context.runPendingJobs());
      if (!error) return;
      this.reportScriptError('jobs', error);
    }
    this.logger.warn(
      `[blueprint:ScriptBridge] Job queue still failing after ${MAX_JOB_FLUSHES} drains`
    );
  }

  private run<T>(call: () => T): T {
    this.depth++;
    try {
      return call();
    } finally {
      this.depth--;
    }
  }

  /**
   * Describe, release, log and report a thrown script value
   */
  private reportScriptError(source: ScriptErrorSource, error: ScriptHandle): string {
    let description: string;
    try {
      description = this.codec.describeError(error);
    } finally {
      this.context.release(error);
    }
    this.logger.error(`[blueprint:ScriptBridge] Script ${source} error:`, description);
    this.opts.onScriptError?.({ source, description });
    return description;
  }

  private warnMissing(name: string): void {
    if (this.warnedMissing.has(name)) return;
    this.warnedMissing.add(name);
    this.logger.warn(`[blueprint:ScriptBridge] ${name} is not a function`);
  }

  private assertAlive(operation: string): void {
    if (this.disposed) {
      throw new InvariantError(`Cannot ${operation}: script bridge has been disposed`);
    }
  }

  /**
   * Release the codec and the context. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.codec.dispose();
    this.context.dispose();
    this.log('disposed');
  }
}
