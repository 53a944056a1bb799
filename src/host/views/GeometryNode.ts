/**
 * Geometry Nodes
 *
 * Layout side of the dual tree. Mirrors the render tree except raw text leaves.
 * A geometry node only knows the id of its render counterpart; the tree manager
 * resolves it when layout results are flushed.
 */

import { EMPTY_RECT, isNativeMap, type NativeValue, type Rect, type ViewId } from '../../shared';

export type FlexDirection = 'row' | 'column';
export type AlignItems = 'stretch' | 'start' | 'center' | 'end';

/**
 * Layout inputs parsed from view properties
 */
export interface LayoutStyle {
  width?: number;
  height?: number;
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
  flex: number;
  flexDirection: FlexDirection;
  alignItems: AlignItems;
  padding: number;
  margin: number;
  fontSize: number;
  lineHeight?: number;
}

export interface Size {
  width: number;
  height: number;
}

export const DEFAULT_FONT_SIZE = 16;

const NUMERIC_KEYS = [
  'width',
  'height',
  'minWidth',
  'maxWidth',
  'minHeight',
  'maxHeight',
  'lineHeight',
] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];

const NUMERIC_KEY_SET: ReadonlySet<string> = new Set(NUMERIC_KEYS);

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEY_SET.has(key);
}

export function defaultLayoutStyle(): LayoutStyle {
  return {
    flex: 0,
    flexDirection: 'column',
    alignItems: 'stretch',
    padding: 0,
    margin: 0,
    fontSize: DEFAULT_FONT_SIZE,
  };
}

export class GeometryNode {
  readonly viewId: ViewId;
  readonly children: GeometryNode[] = [];
  parent: GeometryNode | null = null;
  style: LayoutStyle = defaultLayoutStyle();
  layout: Rect = { ...EMPTY_RECT };
  dirty = true;

  constructor(viewId: ViewId) {
    this.viewId = viewId;
  }

  /**
   * Whether the node keeps its natural size along the parent's main axis
   * instead of being limited by the space the parent hands out
   */
  get growsWithContent(): boolean {
    return false;
  }

  /**
   * Apply a view property. Keys without layout meaning are ignored; a `style`
   * map applies each of its entries.
   */
  setProperty(key: string, value: NativeValue): void {
    if (key === 'style' && value !== null && value !== undefined && isNativeMap(value)) {
      for (const [styleKey, styleValue] of value) {
        this.applyStyle(styleKey, styleValue);
      }
    } else {
      this.applyStyle(key, value);
    }
    this.markDirty();
  }

  /**
   * Mark this node and its ancestors as needing layout
   */
  markDirty(): void {
    let node: GeometryNode | null = this;
    while (node && !node.dirty) {
      node.dirty = true;
      node = node.parent;
    }
  }

  addChild(child: GeometryNode, index?: number): void {
    child.parent?.removeChild(child);
    if (index === undefined || index < 0 || index >= this.children.length) {
      this.children.push(child);
    } else {
      this.children.splice(index, 0, child);
    }
    child.parent = this;
    this.markDirty();
  }

  removeChild(child: GeometryNode): boolean {
    const index = this.children.indexOf(child);
    if (index === -1) return false;
    this.children.splice(index, 1);
    child.parent = null;
    this.markDirty();
    return true;
  }

  /**
   * Intrinsic size of a leaf for the given available width, or null when the
   * node's size comes from its children
   */
  measure(_availableWidth: number): Size | null {
    return null;
  }

  private applyStyle(key: string, value: NativeValue): void {
    if (isNumericKey(key)) {
      this.style[key] = typeof value === 'number' ? value : undefined;
      return;
    }
    switch (key) {
      case 'flex':
      case 'padding':
      case 'margin':
        this.style[key] = typeof value === 'number' ? value : 0;
        break;
      case 'fontSize':
        this.style.fontSize = typeof value === 'number' ? value : DEFAULT_FONT_SIZE;
        break;
      case 'flexDirection':
        this.style.flexDirection = value === 'row' ? 'row' : 'column';
        break;
      case 'alignItems':
        this.style.alignItems =
          value === 'start' || value === 'center' || value === 'end' ? value : 'stretch';
        break;
    }
  }
}

/**
 * Supplies the text a TextGeometryNode measures
 */
export interface TextSource {
  getTextContent: () => string;
}

/**
 * Geometry of a Text view. Text is laid out on a fixed advance grid:
 * each glyph is fontSize / 2 wide and each line is lineHeight (default fontSize) tall.
 */
export class TextGeometryNode extends GeometryNode {
  private readonly source: TextSource;

  constructor(viewId: ViewId, source: TextSource) {
    super(viewId);
    this.source = source;
  }

  override measure(availableWidth: number): Size {
    const text = this.source.getTextContent();
    if (text.length === 0) return { width: 0, height: 0 };

    const advance = this.style.fontSize / 2;
    const lineHeight = this.style.lineHeight ?? this.style.fontSize;
    const perLine =
      Number.isFinite(availableWidth) && advance > 0
        ? Math.max(1, Math.floor(availableWidth / advance))
        : Number.POSITIVE_INFINITY;

    let lines = 0;
    let longest = 0;
    for (const paragraph of text.split('\n')) {
      const length = paragraph.length;
      lines += Math.max(1, Math.ceil(length / perLine));
      longest = Math.max(longest, Math.min(length, perLine));
    }

    return { width: longest * advance, height: lines * lineHeight };
  }
}

/**
 * Geometry of the content view inside a scroll container: grows with its
 * content along the container's main axis.
 */
export class ScrollContentGeometryNode extends GeometryNode {
  override get growsWithContent(): boolean {
    return true;
  }
}
