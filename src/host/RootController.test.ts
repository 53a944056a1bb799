/**
 * Root Controller Tests
 *
 * Controllers share one provider so the QuickJS module loads once. Fake timers
 * are switched on only after initialize(), once the module has loaded.
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { QuickJSProvider } from '../sandbox';
import type { ControllerEvents, Logger, RootControllerOptions } from './engine/types';
import { ControllerStateError } from './engine/types';
import { RootController } from './RootController';
import { RenderNode } from './views/RenderNode';

const provider = new QuickJSProvider();

const silentLogger = (): Logger => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('RootController', () => {
  let controller: RootController | null = null;

  async function createController(options: RootControllerOptions = {}): Promise<RootController> {
    controller = new RootController({
      provider,
      width: 100,
      height: 100,
      logger: silentLogger(),
      ...options,
    });
    await controller.initialize();
    return controller;
  }

  afterEach(() => {
    controller?.destroy();
    controller = null;
    vi.useRealTimers();
  });

  describe('lifecycle', () => {
    test('should walk through its states in order', async () => {
      const root = new RootController({ provider, logger: silentLogger() });
      controller = root;
      const changes: Array<ControllerEvents['stateChange']> = [];
      root.on('stateChange', (change) => changes.push(change));

      await root.initialize();
      root.reload();
      root.destroy();

      expect(changes).toEqual([
        { from: 'uninitialized', to: 'ready' },
        { from: 'ready', to: 'reloading' },
        { from: 'reloading', to: 'ready' },
        { from: 'ready', to: 'destroyed' },
      ]);
    });

    test('should refuse a second initialize', async () => {
      const root = await createController();
      await expect(root.initialize()).rejects.toThrow(ControllerStateError);
    });

    test('should reject calls after destroy and tolerate a second destroy', async () => {
      const root = await createController();
      root.destroy();

      expect(() => root.evalScript('1')).toThrow(ControllerStateError);
      expect(() => root.tick()).toThrow(ControllerStateError);
      expect(() => root.resize(10, 10)).toThrow(ControllerStateError);
      expect(() => root.destroy()).not.toThrow();
      expect(root.state).toBe('destroyed');
    });
  });

  describe('evalScript()', () => {
    test('should start ticking even when evaluation fails', async () => {
      const root = await createController();
      const errors: Array<ControllerEvents['scriptError']> = [];
      root.on('scriptError', (event) => errors.push(event));

      const result = root.evalScript("throw new Error('nope')");

      expect(result.ok).toBe(false);
      expect(root.isTicking).toBe(true);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.source).toBe('evaluate');
      expect(errors[0]?.description).toContain('nope');
      expect(root.stats.scriptErrors).toBe(1);
    });
  });

  describe('ticking', () => {
    test('should deliver the scheduler interrupt on every interval', async () => {
      const root = await createController({ tickInterval: 4 });
      const spy = vi.fn();
      root.registerNativeMethod('onTick', spy);
      vi.useFakeTimers();

      root.evalScript('var __schedulerInterrupt__ = function () { __BlueprintNative__.onTick(); };');
      vi.advanceTimersByTime(12);

      expect(spy).toHaveBeenCalledTimes(3);
      expect(root.stats.ticks).toBe(3);
    });

    test('should report script failures during a tick', async () => {
      const root = await createController();
      const errors: Array<ControllerEvents['scriptError']> = [];
      root.on('scriptError', (event) => errors.push(event));
      root.evalScript(
        "var __schedulerInterrupt__ = function () { throw new Error('tick fail'); };"
      );

      expect(root.tick()).toBe(false);
      expect(errors[0]?.source).toBe('tick');
      expect(errors[0]?.description).toContain('tick fail');
    });

    test('should return true for a tick that ran to completion', async () => {
      const root = await createController();
      root.evalScript('var __schedulerInterrupt__ = function () {};');
      expect(root.tick()).toBe(true);
    });

    test('should skip a tick requested while the script is running', async () => {
      const root = await createController();
      const results: boolean[] = [];
      root.registerNativeMethod('reenter', () => {
        results.push(root.tick());
      });
      root.evalScript('var __schedulerInterrupt__ = function () {};');

      root.evalScript('__BlueprintNative__.reenter();');

      expect(results).toEqual([false]);
      expect(root.stats.skippedTicks).toBe(1);
    });
  });

  describe('reload()', () => {
    test('should start over with a fresh context and tree', async () => {
      const root = await createController();
      root.registerViewType('Box', (id) => ({ render: new RenderNode(id), geometry: null }));
      root.registerNativeMethod('f', vi.fn());
      root.evalScript("__BlueprintNative__.createViewInstance('View');");
      expect(root.tree.has(1)).toBe(true);

      root.reload();

      expect(root.isTicking).toBe(false);
      expect(root.stats.nativeMethods).toBe(0);
      expect(root.tree.isStale(1)).toBe(true);

      const result = root.evalScript(
        "__BlueprintNative__.addChild(0, __BlueprintNative__.createViewInstance('Box'));"
      );
      expect(result).toEqual({ ok: true });
      expect(root.tree.rootView.children).toHaveLength(1);
    });

    test('should refuse to reload or destroy from inside a script call', async () => {
      const root = await createController();
      root.registerNativeMethod('reloadNow', () => root.reload());
      root.registerNativeMethod('destroyNow', () => root.destroy());

      const reloaded = root.evalScript('__BlueprintNative__.reloadNow(); var after = 1;');
      expect(reloaded.ok).toBe(false);
      if (!reloaded.ok) {
        expect(reloaded.error).toContain(
          'Cannot reload from inside a script call while controller is ready'
        );
      }

      const destroyed = root.evalScript('__BlueprintNative__.destroyNow();');
      expect(destroyed.ok).toBe(false);
      expect(root.state).toBe('ready');
      expect(root.evalScript('var still = true;')).toEqual({ ok: true });
    });

    test('should only run when ready', () => {
      const root = new RootController({ provider, logger: silentLogger() });
      controller = root;
      expect(() => root.reload()).toThrow(ControllerStateError);
    });
  });

  describe('resize()', () => {
    test('should report whether the viewport changed', async () => {
      const root = await createController();

      expect(root.resize(100, 100)).toBe(false);
      expect(root.resize(200, 50)).toBe(true);
      expect(root.tree.rootView.bounds).toEqual({ x: 0, y: 0, width: 200, height: 50 });
    });
  });

  describe('events and queries', () => {
    test('should pass view events to the script', async () => {
      const root = await createController();
      const spy = vi.fn();
      root.registerNativeMethod('f', spy);
      root.evalScript(`
        __BlueprintNative__.dispatchViewEvent = function (id, type, x) {
          __BlueprintNative__.f(id, type, x);
        };
      `);

      expect(root.dispatchViewEvent(5, 'press', 1.5)).toBe(true);
      expect(spy).toHaveBeenCalledWith([5, 'press', 1.5]);
    });

    test('should find views by refId', async () => {
      const root = await createController();
      root.evalScript(`
        var N = __BlueprintNative__;
        var box = N.createViewInstance('View');
        N.setViewProperty(box, 'refId', 'header');
        N.addChild(0, box);
      `);

      expect(root.getViewByRefId('header')?.id).toBe(1);
      expect(root.getViewByRefId('missing')).toBeNull();
    });
  });
});
