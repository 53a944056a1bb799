/**
 * @blueprint/shared - Boundary Type System
 *
 * Values that can cross between the sandboxed script and the host.
 * The host side never sees engine handles, only these native values.
 */

// ============================================
// Identifiers
// ============================================

/**
 * Opaque view identifier, stable for the lifetime of a node.
 * Never reused within a process run.
 */
export type ViewId = number;

/**
 * Id shared by the root render node and the root geometry node
 */
export const ROOT_VIEW_ID: ViewId = 0;

// ============================================
// Native values
// ============================================

/**
 * Primitive native values.
 * `null` is the "absent" value; `undefined` is the explicit undefined marker.
 */
export type NativePrimitive = null | undefined | boolean | number | string;

/**
 * Full set of values the codec can marshal
 */
export type NativeValue = NativePrimitive | NativeList | NativeMap;

/**
 * Ordered list
 */
export interface NativeList extends Array<NativeValue> {}

/**
 * String-keyed map, iterated in insertion order
 */
export type NativeMap = Map<string, NativeValue>;

/**
 * Argument kinds accepted by registered native methods
 */
export type NativeArgument = string | number | boolean;

/**
 * Argument list handed to a registered native method
 */
export type NativeFunctionArgs = readonly NativeArgument[];

/**
 * Host closure reachable from script through the method registry
 */
export type NativeMethod = (args: NativeFunctionArgs) => void;

// ============================================
// Geometry
// ============================================

/**
 * Rectangle relative to the parent's origin
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const EMPTY_RECT: Readonly<Rect> = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

export function isNativeMap(value: NativeValue): value is NativeMap {
  return value instanceof Map;
}

export function rectEquals(a: Readonly<Rect>, b: Readonly<Rect>): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}
