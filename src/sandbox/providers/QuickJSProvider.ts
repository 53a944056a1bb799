/**
 * QuickJSProvider - QuickJS compiled to WebAssembly
 *
 * Runs on quickjs-emscripten. Each runtime owns one QuickJS runtime; contexts
 * created from it share its memory limit and interrupt handler.
 *
 * Timeout Support:
 * - Hard timeout: YES. An interrupt handler is armed for the outermost eval/call
 *   and removed when it returns.
 */

import {
  getQuickJS,
  type QuickJSContext,
  type QuickJSHandle,
  type QuickJSRuntime,
  type QuickJSWASMModule,
  shouldInterruptAfterDeadline,
} from 'quickjs-emscripten';
import type {
  CallOutcome,
  JSEngineContext,
  JSEngineProvider,
  JSEngineRuntime,
  JSEngineRuntimeOptions,
} from '../types/provider';

type QuickJSResult = ReturnType<QuickJSContext['evalCode']>;

/**
 * Provider options
 */
export interface QuickJSProviderOptions {
  /**
   * Execution timeout (milliseconds)
   * @default 5000
   */
  timeout?: number;

  /**
   * Memory limit in bytes
   */
  memoryLimit?: number;

  /**
   * Custom WASM module factory
   * @default getQuickJS
   */
  moduleFactory?: () => Promise<QuickJSWASMModule>;
}

export class QuickJSProvider implements JSEngineProvider {
  private options: QuickJSProviderOptions;
  private loadPromise: Promise<QuickJSWASMModule> | null = null;

  constructor(options: QuickJSProviderOptions = {}) {
    this.options = options;
  }

  async createRuntime(options?: JSEngineRuntimeOptions): Promise<JSEngineRuntime> {
    const module = await this.loadModule();
    const runtime = module.newRuntime();

    const memoryLimit = options?.memoryLimit ?? this.options.memoryLimit;
    if (memoryLimit !== undefined) {
      runtime.setMemoryLimit(memoryLimit);
    }
    const timeout = options?.timeout ?? this.options.timeout ?? 5000;
    const contexts = new Set<JSEngineContext>();

    return {
      createContext: <THost>(host: THost): JSEngineContext<THost> => {
        const context = createContext(runtime, host, timeout, () => contexts.delete(context));
        contexts.add(context);
        return context;
      },
      get contextCount() {
        return contexts.size;
      },
      dispose: () => {
        // Dispose all live contexts created by this runtime
        for (const context of Array.from(contexts)) {
          context.dispose();
        }
        contexts.clear();
        if (runtime.alive) runtime.dispose();
      },
    };
  }

  private loadModule(): Promise<QuickJSWASMModule> {
    if (!this.loadPromise) {
      const factory = this.options.moduleFactory ?? getQuickJS;
      this.loadPromise = factory();
    }
    return this.loadPromise;
  }
}

function createContext<THost>(
  runtime: QuickJSRuntime,
  host: THost,
  timeout: number,
  onDispose: () => void
): JSEngineContext<THost> {
  const vm = runtime.newContext();
  const tracked = new Set<QuickJSHandle>();
  let disposed = false;
  // Nested calls (script → host → script) share the outermost deadline
  let callDepth = 0;

  const track = (handle: QuickJSHandle): QuickJSHandle => {
    tracked.add(handle);
    return handle;
  };

  const guarded = <T>(run: () => T): T => {
    if (callDepth === 0 && timeout > 0) {
      runtime.setInterruptHandler(shouldInterruptAfterDeadline(Date.now() + timeout));
    }
    callDepth++;
    try {
      return run();
    } finally {
      callDepth--;
      if (callDepth === 0 && timeout > 0) {
        runtime.removeInterruptHandler();
      }
    }
  };

  const withDeadline = (run: () => QuickJSResult): CallOutcome => {
    const result = guarded(run);
    if (result.error) {
      return { ok: false, error: track(result.error) };
    }
    return { ok: true, value: track(result.value) };
  };

  return {
    host,
    global: vm.global,
    undefined: vm.undefined,
    null: vm.null,

    get disposed() {
      return disposed;
    },

    get openHandleCount() {
      let count = 0;
      for (const handle of tracked) {
        if (handle.alive) {
          count++;
        } else {
          tracked.delete(handle);
        }
      }
      return count;
    },

    eval: (code, filename = 'script.js') => withDeadline(() => vm.evalCode(code, filename)),

    call: (fn, thisArg, args) => withDeadline(() => vm.callFunction(fn, thisArg, ...args)),

    runPendingJobs: () => {
      const result = guarded(() => runtime.executePendingJobs());
      return result.error ? track(result.error) : null;
    },

    newString: (value) => track(vm.newString(value)),
    newNumber: (value) => track(vm.newNumber(value)),
    newBoolean: (value) => (value ? vm.true : vm.false),
    newObject: () => track(vm.newObject()),
    newArray: () => track(vm.newArray()),
    newFunction: (name, fn) =>
      track(vm.newFunction(name, (...args: QuickJSHandle[]) => fn(args))),

    getProp: (target, key) => track(vm.getProp(target, key)),
    setProp: (target, key, value) => vm.setProp(target, key, value),

    typeOf: (handle) => vm.typeof(handle),
    getNumber: (handle) => vm.getNumber(handle),
    getString: (handle) => vm.getString(handle),
    getBoolean: (handle) => vm.dump(handle) === true,

    release: (handle) => {
      tracked.delete(handle);
      if (handle.alive) handle.dispose();
    },

    dispose: () => {
      if (disposed) return;
      disposed = true;
      for (const handle of tracked) {
        if (handle.alive) handle.dispose();
      }
      tracked.clear();
      vm.dispose();
      onDispose();
    },
  };
}
