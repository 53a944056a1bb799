/**
 * Host ↔ script bridge
 */

export {
  type BridgeHost,
  type EvaluateResult,
  NATIVE_NAMESPACE,
  SCHEDULER_INTERRUPT,
  ScriptBridge,
  type ScriptBridgeOptions,
} from './ScriptBridge';
