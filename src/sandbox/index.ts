/**
 * @blueprint/sandbox - JavaScript Sandbox Providers
 *
 * - QuickJSProvider: QuickJS compiled to WebAssembly (quickjs-emscripten)
 */

export type { QuickJSProviderOptions } from './providers/QuickJSProvider';
export { QuickJSProvider } from './providers/QuickJSProvider';
export type {
  CallOutcome,
  HostFunction,
  JSEngineContext,
  JSEngineProvider,
  JSEngineRuntime,
  JSEngineRuntimeOptions,
  ScriptHandle,
  ScriptPropertyKey,
} from './types/provider';
