/**
 * Tree Manager
 *
 * Owns the render tree, the geometry tree and the id tables behind them, and
 * applies the mutation protocol the script drives through the native namespace.
 * Every structural or property mutation ends with one full layout pass.
 */

import {
  isNativeMap,
  type NativeValue,
  type Rect,
  ROOT_VIEW_ID,
  type ViewId,
} from '../shared';
import {
  InvariantError,
  type Logger,
  type MetricReporter,
  NotAChildError,
  ViewKindMismatchError,
} from './engine/types';
import { StackLayoutSolver } from './layout/StackLayoutSolver';
import type { LayoutSolver } from './layout/types';
import { NodeArena } from './NodeArena';
import type { ViewFactoryRegistry, ViewPair } from './registry';
import { GeometryNode } from './views/GeometryNode';
import {
  isRawTextNode,
  isTextNode,
  NOOP_SURFACE,
  type PaintSurface,
  RawTextNode,
  RenderNode,
} from './views/RenderNode';

export interface TreeManagerOptions {
  registry: ViewFactoryRegistry;
  layoutSolver?: LayoutSolver;
  surface?: PaintSurface;
  width?: number;
  height?: number;
  onMetric?: MetricReporter;
  logger?: Logger;
  debug?: boolean;
}

export interface TreeStats {
  /** Live nodes in the arena (root excluded) */
  nodeCount: number;
  /** Live nodes carrying a geometry node (root excluded) */
  geometryNodeCount: number;
  layoutPasses: number;
  lastLayoutDurationMs: number | null;
}

/**
 * JSON-compatible copy of a property value
 */
export type PlainValue = null | boolean | number | string | PlainValue[] | PlainObject;

export interface PlainObject {
  [key: string]: PlainValue;
}

/**
 * Serializable description of a render subtree
 */
export interface ViewSnapshot {
  id: ViewId;
  kind: RenderNode['kind'];
  refId?: string;
  text?: string;
  bounds: Rect;
  props: PlainObject;
  children: ViewSnapshot[];
}

export class TreeManager {
  private readonly registry: ViewFactoryRegistry;
  private readonly layoutSolver: LayoutSolver;
  private readonly surface: PaintSurface;
  private readonly logger: Logger;
  private readonly opts: { onMetric?: MetricReporter; debug: boolean };
  private arena = new NodeArena<ViewPair>();
  private root: ViewPair;
  private viewport: { width: number; height: number };
  private layoutPasses = 0;
  private lastLayoutDurationMs: number | null = null;

  constructor(options: TreeManagerOptions) {
    this.registry = options.registry;
    this.layoutSolver = options.layoutSolver ?? new StackLayoutSolver();
    this.surface = options.surface ?? NOOP_SURFACE;
    this.logger = options.logger ?? console;
    this.opts = { onMetric: options.onMetric, debug: options.debug ?? false };
    this.viewport = { width: options.width ?? 0, height: options.height ?? 0 };
    this.root = this.createRootPair();
  }

  // Reason: Debug logger accepts arbitrary arguments
  private log(...args: unknown[]): void {
    if (this.opts.debug) {
      this.logger.log('[blueprint:TreeManager]', ...args);
    }
  }

  // ============================================
  // Mutation protocol
  // ============================================

  /**
   * Create a view of a registered type. No layout or paint side effect.
   *
   * @throws UnknownViewTypeError
   */
  createInstance(typeId: string): ViewId {
    const factory = this.registry.get(typeId);
    const id = this.arena.allocate(factory);
    this.log('createInstance', typeId, '->', id);
    return id;
  }

  /**
   * Create a raw text leaf. Raw text has no geometry node.
   */
  createTextInstance(text: string): ViewId {
    const id = this.arena.allocate((viewId) => ({
      render: new RawTextNode(viewId, text),
      geometry: null,
    }));
    this.log('createTextInstance', JSON.stringify(text), '->', id);
    return id;
  }

  setProperty(id: ViewId, key: string, value: NativeValue): void {
    const { render, geometry } = this.lookup(id);
    render.setProperty(key, value);
    geometry?.setProperty(key, value);
    this.recomputeLayout();
    this.surface.repaint(render);
  }

  /**
   * @throws ViewKindMismatchError when `id` is not a raw text node
   */
  setRawText(id: ViewId, text: string): void {
    const { render } = this.lookup(id);
    if (!isRawTextNode(render)) {
      throw new ViewKindMismatchError(`View ${id} is a ${render.kind} view, not raw text`);
    }
    render.text = text;

    const parent = render.parent;
    if (parent && isTextNode(parent)) {
      this.lookup(parent.id).geometry?.markDirty();
      this.recomputeLayout();
      // Raw text does not paint itself; the enclosing text view does
      this.surface.repaint(parent);
    }
  }

  /**
   * Attach `childId` under `parentId` at `index` (append when omitted or out of range).
   * A child that already has a parent is detached from it first.
   */
  addChild(parentId: ViewId, childId: ViewId, index?: number): void {
    const parent = this.lookup(parentId);
    const child = this.lookup(childId);

    if (childId === ROOT_VIEW_ID) {
      throw new InvariantError('The root view cannot be attached as a child');
    }
    for (let node: RenderNode | null = parent.render; node; node = node.parent) {
      if (node === child.render) {
        throw new InvariantError(`Attaching view ${childId} under ${parentId} would form a cycle`);
      }
    }

    switch (parent.render.kind) {
      case 'rawText':
        throw new ViewKindMismatchError(`Raw text view ${parentId} cannot have children`);
      case 'text':
        if (!isRawTextNode(child.render) || child.geometry !== null) {
          throw new ViewKindMismatchError(
            `Text view ${parentId} only accepts raw text children, got ${child.render.kind}`
          );
        }
        this.detach(child);
        parent.render.addChild(child.render, index);
        parent.geometry?.markDirty();
        break;
      default: {
        this.detach(child);
        const siblings = parent.render.children;
        const insertAt =
          index === undefined || index < 0 || index >= siblings.length ? siblings.length : index;
        const geometryIndex = this.countGeometrySiblings(siblings, insertAt);

        parent.render.addChild(child.render, index);
        if (parent.geometry && child.geometry) {
          parent.geometry.addChild(child.geometry, geometryIndex);
        }
      }
    }

    this.log('addChild', parentId, childId, index ?? 'append');
    this.recomputeLayout();
  }

  /**
   * Detach `childId` from `parentId` and release the whole detached subtree
   *
   * @throws NotAChildError
   */
  removeChild(parentId: ViewId, childId: ViewId): void {
    const parent = this.lookup(parentId);
    const child = this.lookup(childId);
    if (child.render.parent !== parent.render) {
      throw new NotAChildError(parentId, childId);
    }

    parent.render.removeChild(child.render);

    const collected: ViewId[] = [];
    collectSubtreeIds(child.render, collected);

    if (parent.geometry && child.geometry) {
      parent.geometry.removeChild(child.geometry);
    }
    if (parent.render.kind === 'text') {
      parent.geometry?.markDirty();
    }

    for (const id of collected) {
      this.arena.release(id);
    }

    this.log('removeChild', parentId, childId, 'released', collected.length);
    this.recomputeLayout();
  }

  // ============================================
  // Lookup
  // ============================================

  /**
   * @throws UnknownViewIdError
   * @throws StaleViewIdError
   */
  lookup(id: ViewId): ViewPair {
    if (id === ROOT_VIEW_ID) return this.root;
    return this.arena.get(id);
  }

  has(id: ViewId): boolean {
    return id === ROOT_VIEW_ID || this.arena.has(id);
  }

  isStale(id: ViewId): boolean {
    return this.arena.isStale(id);
  }

  /**
   * First view whose `refId` equals `refId`: the root first, then live views in
   * slot order
   */
  lookupByRefId(refId: string): RenderNode | null {
    if (this.root.render.refId === refId) return this.root.render;
    for (const pair of this.arena.values()) {
      if (pair.render.refId === refId) return pair.render;
    }
    return null;
  }

  get rootView(): RenderNode {
    return this.root.render;
  }

  get rootGeometry(): GeometryNode {
    return this.root.geometry ?? this.fail('root geometry missing');
  }

  // ============================================
  // Layout
  // ============================================

  /**
   * Run the layout solver over the geometry tree and copy every computed rect
   * onto the paired render node
   */
  recomputeLayout(): void {
    const t0 = Date.now();
    const rootGeometry = this.rootGeometry;
    this.layoutSolver.computeLayout(rootGeometry, this.viewport.width, this.viewport.height);

    let changed = 0;
    const stack: GeometryNode[] = [rootGeometry];
    let node = stack.pop();
    while (node) {
      const pair = this.lookup(node.viewId);
      if (pair.render.setBounds(node.layout)) changed++;
      stack.push(...node.children);
      node = stack.pop();
    }

    const durationMs = Date.now() - t0;
    this.layoutPasses++;
    this.lastLayoutDurationMs = durationMs;
    this.opts.onMetric?.('layout.pass', durationMs, {
      nodeCount: this.arena.size,
      changed,
    });
  }

  setViewport(width: number, height: number): boolean {
    if (this.viewport.width === width && this.viewport.height === height) {
      return false;
    }
    this.viewport = { width, height };
    this.root.render.setBounds({ x: 0, y: 0, width, height });
    this.rootGeometry.markDirty();
    return true;
  }

  /**
   * Drop every view and start over with a fresh root. Ids issued before the
   * reset become stale.
   */
  reset(): void {
    const released = this.arena.size;
    this.arena.clear();
    this.root = this.createRootPair();
    this.log('reset, released', released);
  }

  get stats(): TreeStats {
    let geometryNodeCount = 0;
    for (const pair of this.arena.values()) {
      if (pair.geometry) geometryNodeCount++;
    }
    return {
      nodeCount: this.arena.size,
      geometryNodeCount,
      layoutPasses: this.layoutPasses,
      lastLayoutDurationMs: this.lastLayoutDurationMs,
    };
  }

  /**
   * Plain description of the render tree under `id` (root by default)
   */
  snapshot(id: ViewId = ROOT_VIEW_ID): ViewSnapshot {
    return snapshotNode(this.lookup(id).render);
  }

  // ============================================
  // Internals
  // ============================================

  private createRootPair(): ViewPair {
    const render = new RenderNode(ROOT_VIEW_ID, 'generic');
    render.setBounds({ x: 0, y: 0, width: this.viewport.width, height: this.viewport.height });
    return { render, geometry: new GeometryNode(ROOT_VIEW_ID) };
  }

  private detach(child: ViewPair): void {
    const oldParent = child.render.parent;
    if (!oldParent) return;
    oldParent.removeChild(child.render);
    if (child.geometry) {
      child.geometry.parent?.removeChild(child.geometry);
    }
    if (oldParent.kind === 'text') {
      this.lookup(oldParent.id).geometry?.markDirty();
    }
  }

  private countGeometrySiblings(siblings: readonly RenderNode[], end: number): number {
    let count = 0;
    for (let i = 0; i < end; i++) {
      const sibling = siblings[i];
      if (sibling && this.lookup(sibling.id).geometry) count++;
    }
    return count;
  }

  private fail(message: string): never {
    throw new InvariantError(message);
  }
}

/**
 * Ids of `node` and all its descendants, children before parents
 */
function collectSubtreeIds(node: RenderNode, out: ViewId[]): void {
  for (const child of node.children) {
    collectSubtreeIds(child, out);
  }
  out.push(node.id);
}

function snapshotNode(node: RenderNode): ViewSnapshot {
  const props: PlainObject = {};
  for (const [key, value] of node.props) {
    props[key] = toPlainValue(value);
  }
  const snapshot: ViewSnapshot = {
    id: node.id,
    kind: node.kind,
    bounds: { ...node.bounds },
    props,
    children: node.children.map(snapshotNode),
  };
  if (node.refId !== null) snapshot.refId = node.refId;
  if (isRawTextNode(node)) snapshot.text = node.text;
  return snapshot;
}

export function toPlainValue(value: NativeValue): PlainValue {
  if (value === undefined) return null;
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (value !== null && isNativeMap(value)) {
    const object: PlainObject = {};
    for (const [key, entry] of value) {
      object[key] = toPlainValue(entry);
    }
    return object;
  }
  return value;
}
