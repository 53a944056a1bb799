/**
 * @blueprint/sandbox - JSEngineProvider Interface
 *
 * Abstracts the embedded script engine behind three layers:
 *
 * - JSEngineProvider: The top-level factory for creating a runtime.
 * - JSEngineRuntime: A runtime instance that can create one or more isolated contexts.
 * - JSEngineContext: A single, isolated evaluation context with handle primitives.
 *
 * Values inside the context are addressed through handles. Every handle a caller
 * obtains from a context method must be given back through `release()`.
 */

import type { QuickJSHandle } from 'quickjs-emscripten';

/**
 * Reference to a value living inside the evaluation context
 */
export type ScriptHandle = QuickJSHandle;

/**
 * Property key accepted by getProp/setProp
 */
export type ScriptPropertyKey = string | number;

/**
 * Host implementation behind a script-visible function.
 * Argument handles are owned by the engine and must not be released.
 * A returned handle is consumed by the engine.
 */
export type HostFunction = (args: ScriptHandle[]) => ScriptHandle | undefined;

/**
 * Outcome of evaluating code or calling a function.
 * The caller owns `value` / `error` and must release it.
 */
export type CallOutcome = { ok: true; value: ScriptHandle } | { ok: false; error: ScriptHandle };

/**
 * JSEngineContext - Represents an isolated JS execution context.
 *
 * `THost` is the host user data carried by the context, so that host functions
 * can recover their owner without a global back-pointer.
 */
export interface JSEngineContext<THost = unknown> {
  /** Host user data supplied at creation */
  readonly host: THost;

  /** Global object. Owned by the context, never released by callers. */
  readonly global: ScriptHandle;

  /** Static `undefined` */
  readonly undefined: ScriptHandle;

  /** Static `null` */
  readonly null: ScriptHandle;

  /** Whether dispose() has been called */
  readonly disposed: boolean;

  /**
   * Number of handles handed out by this context that are still alive.
   * Balanced call sequences leave it unchanged.
   */
  readonly openHandleCount: number;

  /**
   * Synchronously evaluates a string of JavaScript code.
   * Blocks until execution completes or the timeout interrupts it.
   */
  eval: (code: string, filename?: string) => CallOutcome;

  /** Calls `fn` with `thisArg` and arguments */
  call: (fn: ScriptHandle, thisArg: ScriptHandle, args: readonly ScriptHandle[]) => CallOutcome;

  /** Runs queued promise jobs; returns the first error handle or null */
  runPendingJobs: () => ScriptHandle | null;

  newString: (value: string) => ScriptHandle;
  newNumber: (value: number) => ScriptHandle;
  newBoolean: (value: boolean) => ScriptHandle;
  newObject: () => ScriptHandle;
  newArray: () => ScriptHandle;
  newFunction: (name: string, fn: HostFunction) => ScriptHandle;

  getProp: (target: ScriptHandle, key: ScriptPropertyKey) => ScriptHandle;
  setProp: (target: ScriptHandle, key: ScriptPropertyKey, value: ScriptHandle) => void;

  /** Result of the `typeof` operator */
  typeOf: (handle: ScriptHandle) => string;
  getNumber: (handle: ScriptHandle) => number;
  getString: (handle: ScriptHandle) => string;
  getBoolean: (handle: ScriptHandle) => boolean;

  /** Gives a handle back to the context */
  release: (handle: ScriptHandle) => void;

  /**
   * Disposes of this context, releasing all associated resources.
   */
  dispose: () => void;
}

/**
 * JSEngineRuntime - An instance of a JS runtime.
 * It can create and manage one or more isolated JSEngineContexts.
 */
export interface JSEngineRuntime {
  /**
   * Creates a new, isolated JS execution context carrying `host` as user data.
   */
  createContext: <THost>(host: THost) => JSEngineContext<THost>;

  /** Contexts created by this runtime that have not been disposed */
  readonly contextCount: number;

  /**
   * Disposes of this runtime and all contexts it has created.
   */
  dispose: () => void;
}

/**
 * Options for creating a JSEngineRuntime.
 */
export interface JSEngineRuntimeOptions {
  /**
   * The execution timeout for a single eval/call in milliseconds. 0 disables it.
   */
  timeout?: number;

  /**
   * The memory limit in bytes.
   */
  memoryLimit?: number;
}

/**
 * JSEngineProvider - The top-level abstraction for a JS engine.
 * Responsible for creating runtime instances based on configuration.
 */
export interface JSEngineProvider {
  /**
   * Creates a JS runtime instance.
   * Asynchronous because the engine's WebAssembly module loads on first use.
   */
  createRuntime: (options?: JSEngineRuntimeOptions) => Promise<JSEngineRuntime>;
}
