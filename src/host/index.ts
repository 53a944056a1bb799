/**
 * @blueprint/host
 *
 * Host side of the renderer: dual tree, layout, script bridge and root controller
 */

export * from './bridge';
export { EventManager } from './engine/events';
export { TickScheduler, type TickSchedulerOptions } from './engine/TickScheduler';
export type {
  ControllerEvents,
  ControllerState,
  EventListener,
  Logger,
  MetricReporter,
  RootControllerOptions,
  ScriptErrorEvent,
  ScriptErrorSource,
} from './engine/types';
export {
  ControllerStateError,
  InvariantError,
  NotAChildError,
  StaleViewIdError,
  UnknownViewIdError,
  UnknownViewTypeError,
  UnsupportedValueError,
  ViewKindMismatchError,
  ViewTypeAlreadyRegisteredError,
} from './engine/types';
export { StackLayoutSolver } from './layout/StackLayoutSolver';
export type { LayoutSolver } from './layout/types';
export { decodeViewId, NodeArena, SLOT_SPAN } from './NodeArena';
export {
  BUILTIN_VIEW_TYPES,
  installBuiltinViewTypes,
  type ViewFactory,
  ViewFactoryRegistry,
  type ViewPair,
} from './registry';
export { RootController, type RootControllerStats } from './RootController';
export {
  type PlainObject,
  type PlainValue,
  toPlainValue,
  TreeManager,
  type TreeManagerOptions,
  type TreeStats,
  type ViewSnapshot,
} from './TreeManager';
export {
  type AlignItems,
  DEFAULT_FONT_SIZE,
  type FlexDirection,
  GeometryNode,
  type LayoutStyle,
  ScrollContentGeometryNode,
  type Size,
  type TextSource,
  TextGeometryNode,
} from './views/GeometryNode';
export {
  isRawTextNode,
  isTextNode,
  NOOP_SURFACE,
  type PaintSurface,
  RawTextNode,
  RenderNode,
  TextNode,
  type ViewKind,
} from './views/RenderNode';
