/**
 * Root Controller
 *
 * Top-level orchestrator: owns the sandbox runtime, the script bridge, the
 * dual tree and the tick. Every collaborator belongs to exactly one controller.
 *
 * Lifecycle:
 *   uninitialized → ready → (reloading → ready)* → destroyed
 *
 * @example
 * ```typescript
 * const root = new RootController({ width: 320, height: 240 });
 * await root.initialize();
 * root.registerNativeMethod('log', (args) => console.log(...args));
 * root.evalScript(bundleSource);
 * // ...
 * root.destroy();
 * ```
 */

import { type JSEngineRuntime, QuickJSProvider } from '../sandbox';
import {
  MethodRegistry,
  type NativeMethod,
  type NativeValue,
  type ViewId,
} from '../shared';
import {
  type BridgeHost,
  type EvaluateResult,
  SCHEDULER_INTERRUPT,
  ScriptBridge,
} from './bridge/ScriptBridge';
import { EventManager } from './engine/events';
import { TickScheduler } from './engine/TickScheduler';
import {
  type ControllerEvents,
  type ControllerState,
  ControllerStateError,
  type EventListener,
  type Logger,
  type RootControllerOptions,
} from './engine/types';
import { installBuiltinViewTypes, type ViewFactory, ViewFactoryRegistry } from './registry';
import { type TreeStats, TreeManager } from './TreeManager';
import type { RenderNode } from './views/RenderNode';

let controllerIdCounter = 0;

export interface RootControllerStats {
  state: ControllerState;
  tree: TreeStats;
  nativeMethods: number;
  ticks: number;
  skippedTicks: number;
  scriptErrors: number;
}

export class RootController implements BridgeHost {
  readonly id: string;
  readonly tree: TreeManager;
  readonly methods = new MethodRegistry();
  private readonly registry = new ViewFactoryRegistry();
  private readonly events: EventManager;
  private readonly scheduler: TickScheduler;
  private readonly options: {
    timeout: number;
    memoryLimit?: number;
    debug: boolean;
    logger: Logger;
  } & Pick<RootControllerOptions, 'provider' | 'onMetric'>;
  private runtime: JSEngineRuntime | null = null;
  private bridge: ScriptBridge | null = null;
  private _state: ControllerState = 'uninitialized';
  private scriptErrorCount = 0;
  private lastTickOk = true;

  constructor(options: RootControllerOptions = {}) {
    this.options = {
      provider: options.provider,
      timeout: options.timeout ?? 5000,
      memoryLimit: options.memoryLimit,
      debug: options.debug ?? false,
      logger: options.logger ?? console,
      onMetric: options.onMetric,
    };
    this.id = `root-${++controllerIdCounter}-${Date.now().toString(36)}`;

    this.events = new EventManager(this.options.logger, this.options.debug);
    this.tree = new TreeManager({
      registry: this.registry,
      layoutSolver: options.layoutSolver,
      surface: options.surface,
      width: options.width,
      height: options.height,
      onMetric: options.onMetric,
      logger: this.options.logger,
      debug: this.options.debug,
    });
    this.scheduler = new TickScheduler({
      interval: options.tickInterval ?? 4,
      onTick: () => this.deliverTick(),
      isBusy: () => this.bridge?.busy ?? false,
      debug: this.options.debug,
      logger: this.options.logger,
    });

    this.log('Controller created');
  }

  // Reason: Debug logger accepts arbitrary arguments
  private log(...args: unknown[]): void {
    if (this.options.debug) {
      this.options.logger.log(`[blueprint:${this.id}]`, ...args);
    }
  }

  get state(): ControllerState {
    return this._state;
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Create the sandbox runtime and evaluation context, install the native
   * namespace and the built-in view types
   */
  async initialize(): Promise<void> {
    this.requireState('initialize', 'uninitialized');
    const provider = this.options.provider ?? new QuickJSProvider();
    const runtime = await provider.createRuntime({
      timeout: this.options.timeout,
      memoryLimit: this.options.memoryLimit,
    });

    // destroy() may have run while the runtime was loading
    if (this._state !== 'uninitialized') {
      runtime.dispose();
      throw new ControllerStateError('initialize', this._state);
    }

    this.runtime = runtime;
    installBuiltinViewTypes(this.registry);
    this.bridge = this.createBridge(runtime);
    this.setState('ready');
  }

  /**
   * Evaluate a script, then start the tick whether or not evaluation succeeded
   */
  evalScript(code: string, filename?: string): EvaluateResult {
    const bridge = this.requireBridge('evalScript');
    this.log('Evaluating script, length:', code.length);
    const result = bridge.evaluate(code, filename);
    this.scheduler.start();
    return result;
  }

  /**
   * Deliver one scheduler interrupt synchronously.
   * Returns false when it was skipped or the script failed.
   */
  tick(): boolean {
    this.requireBridge('tick');
    const before = this.scheduler.tickCount;
    this.scheduler.tick();
    return this.scheduler.tickCount > before && this.lastTickOk;
  }

  private deliverTick(): void {
    const bridge = this.bridge;
    if (!bridge || this._state !== 'ready') {
      this.lastTickOk = false;
      return;
    }
    this.lastTickOk = bridge.callGlobal(SCHEDULER_INTERRUPT, 'tick');
  }

  /**
   * Throw away the evaluation context and the trees and start over with a fresh
   * context. The caller re-evaluates the script; view types survive, native
   * methods do not.
   */
  reload(): void {
    const runtime = this.runtime;
    if (this._state !== 'ready' || !runtime) {
      throw new ControllerStateError('reload', this._state);
    }
    this.requireIdle('reload');
    this.setState('reloading');
    this.scheduler.stop();
    this.bridge?.dispose();
    this.bridge = null;
    this.methods.clear();
    this.tree.reset();
    this.bridge = this.createBridge(runtime);
    this.setState('ready');
  }

  /**
   * Update the viewport; relayouts when the size changed
   */
  resize(width: number, height: number): boolean {
    this.requireNotDestroyed('resize');
    if (!this.tree.setViewport(width, height)) return false;
    this.tree.recomputeLayout();
    return true;
  }

  /**
   * Stop the tick and release the context and runtime. Safe to call twice.
   *
   * @throws ControllerStateError when called from a native method while script runs
   */
  destroy(): void {
    if (this._state === 'destroyed') return;
    this.requireIdle('destroy');
    this.scheduler.stop();
    this.bridge?.dispose();
    this.bridge = null;
    this.runtime?.dispose();
    this.runtime = null;
    this.methods.clear();
    this.setState('destroyed');
    this.events.removeAllListeners();
    this.log('Controller destroyed');
  }

  // ============================================
  // Registration
  // ============================================

  /**
   * @throws ViewTypeAlreadyRegisteredError
   */
  registerViewType(typeId: string, factory: ViewFactory): void {
    this.requireNotDestroyed('registerViewType');
    this.registry.register(typeId, factory);
  }

  /**
   * Expose a host closure as `__BlueprintNative__[name]`. Returns its registry index.
   */
  registerNativeMethod(name: string, fn: NativeMethod): number {
    return this.requireBridge('registerNativeMethod').registerNativeMethod(name, fn);
  }

  // ============================================
  // Events & queries
  // ============================================

  dispatchEvent(eventType: string, ...args: NativeValue[]): boolean {
    return this.requireBridge('dispatchEvent').dispatchEvent(eventType, args);
  }

  dispatchViewEvent(viewId: ViewId, eventType: string, ...args: NativeValue[]): boolean {
    return this.requireBridge('dispatchViewEvent').dispatchViewEvent(viewId, eventType, args);
  }

  getViewByRefId(refId: string): RenderNode | null {
    return this.tree.lookupByRefId(refId);
  }

  on<K extends keyof ControllerEvents>(
    event: K,
    listener: EventListener<ControllerEvents[K]>
  ): () => void {
    return this.events.on(event, listener);
  }

  get isTicking(): boolean {
    return this.scheduler.isRunning;
  }

  get stats(): RootControllerStats {
    return {
      state: this._state,
      tree: this.tree.stats,
      nativeMethods: this.methods.size,
      ticks: this.scheduler.tickCount,
      skippedTicks: this.scheduler.skippedCount,
      scriptErrors: this.scriptErrorCount,
    };
  }

  // ============================================
  // Internals
  // ============================================

  private createBridge(runtime: JSEngineRuntime): ScriptBridge {
    return new ScriptBridge(runtime, this, {
      debug: this.options.debug,
      logger: this.options.logger,
      onMetric: this.options.onMetric,
      onScriptError: (event) => {
        this.scriptErrorCount++;
        this.events.emit('scriptError', event);
      },
    });
  }

  private setState(to: ControllerState): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    this.log(`State ${from} -> ${to}`);
    this.events.emit('stateChange', { from, to });
  }

  private requireState(operation: string, expected: ControllerState): void {
    if (this._state !== expected) {
      throw new ControllerStateError(operation, this._state);
    }
  }

  /**
   * The context must not be torn down under a running script call
   */
  private requireIdle(operation: string): void {
    if (this.bridge?.busy) {
      throw new ControllerStateError(`${operation} from inside a script call`, this._state);
    }
  }

  private requireNotDestroyed(operation: string): void {
    if (this._state === 'destroyed') {
      throw new ControllerStateError(operation, this._state);
    }
  }

  private requireBridge(operation: string): ScriptBridge {
    const bridge = this.bridge;
    if (this._state !== 'ready' || !bridge) {
      throw new ControllerStateError(operation, this._state);
    }
    return bridge;
  }
}
