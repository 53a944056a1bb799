/**
 * Controller Types and Interfaces
 */

import type { JSEngineProvider } from '../../sandbox';
import type { ViewId } from '../../shared';
import type { LayoutSolver } from '../layout/types';
import type { PaintSurface } from '../views/RenderNode';

/**
 * Logger used for every host-side diagnostic
 */
export interface Logger {
  // Reason: Logger methods accept arbitrary console arguments
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Metric reporter hook
 */
export type MetricReporter = (name: string, value: number, extra?: Record<string, unknown>) => void;

/**
 * Root controller configuration options
 */
export interface RootControllerOptions {
  /**
   * JS engine provider used to create the sandbox runtime.
   * Defaults to the QuickJS provider.
   */
  provider?: JSEngineProvider;

  /**
   * Initial viewport width
   * @default 0
   */
  width?: number;

  /**
   * Initial viewport height
   * @default 0
   */
  height?: number;

  /**
   * Scheduler interrupt period (milliseconds)
   * @default 4
   */
  tickInterval?: number;

  /**
   * Execution timeout for a single script call (milliseconds).
   * 0 disables the interrupt.
   * @default 5000
   */
  timeout?: number;

  /**
   * Sandbox memory limit in bytes
   */
  memoryLimit?: number;

  /**
   * Layout solver used for every layout pass
   */
  layoutSolver?: LayoutSolver;

  /**
   * Paint surface receiving repaint requests
   */
  surface?: PaintSurface;

  /**
   * Enable debug mode
   * @default false
   */
  debug?: boolean;

  /**
   * Custom logger
   */
  logger?: Logger;

  /**
   * Performance metrics reporter hook
   */
  onMetric?: MetricReporter;
}

/**
 * Lifecycle states of a root controller
 */
export type ControllerState = 'uninitialized' | 'ready' | 'reloading' | 'destroyed';

/**
 * Where a script-originated failure happened
 */
export type ScriptErrorSource = 'evaluate' | 'dispatch' | 'tick' | 'jobs';

export interface ScriptErrorEvent {
  source: ScriptErrorSource;
  description: string;
}

/**
 * Controller events
 */
export interface ControllerEvents {
  scriptError: ScriptErrorEvent;
  stateChange: { from: ControllerState; to: ControllerState };
}

/**
 * Event listener type
 */
export type EventListener<T> = (data: T) => void;

// ============================================
// Errors
// ============================================

/**
 * Broken host-side invariant. Not meant to be recovered from inside the host;
 * the script boundary turns it into a script exception.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class UnknownViewTypeError extends InvariantError {
  constructor(readonly typeId: string) {
    super(`View type "${typeId}" is not registered`);
    this.name = 'UnknownViewTypeError';
  }
}

export class ViewTypeAlreadyRegisteredError extends InvariantError {
  constructor(readonly typeId: string) {
    super(`View type "${typeId}" is already registered`);
    this.name = 'ViewTypeAlreadyRegisteredError';
  }
}

export class UnknownViewIdError extends InvariantError {
  constructor(readonly viewId: ViewId) {
    super(`No view with id ${viewId}`);
    this.name = 'UnknownViewIdError';
  }
}

export class StaleViewIdError extends InvariantError {
  constructor(readonly viewId: ViewId) {
    super(`View id ${viewId} refers to a node that has been released`);
    this.name = 'StaleViewIdError';
  }
}

export class ViewKindMismatchError extends InvariantError {
  constructor(message: string) {
    super(message);
    this.name = 'ViewKindMismatchError';
  }
}

export class NotAChildError extends InvariantError {
  constructor(
    readonly parentId: ViewId,
    readonly childId: ViewId
  ) {
    super(`View ${childId} is not a child of view ${parentId}`);
    this.name = 'NotAChildError';
  }
}

export class UnsupportedValueError extends InvariantError {
  constructor(readonly valueType: string) {
    super(`Cannot marshal value of type "${valueType}"`);
    this.name = 'UnsupportedValueError';
  }
}

export class ControllerStateError extends InvariantError {
  constructor(operation: string, state: ControllerState) {
    super(`Cannot ${operation} while controller is ${state}`);
    this.name = 'ControllerStateError';
  }
}
