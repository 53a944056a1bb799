/**
 * @blueprint/shared
 *
 * Boundary types, value codec and method registry shared by the host modules
 */

export { MethodRegistry } from './MethodRegistry';
export { ValueCodec } from './serialization';
export type {
  NativeArgument,
  NativeFunctionArgs,
  NativeList,
  NativeMap,
  NativeMethod,
  NativePrimitive,
  NativeValue,
  Rect,
  ViewId,
} from './types';
export { EMPTY_RECT, isNativeMap, ROOT_VIEW_ID, rectEquals } from './types';
