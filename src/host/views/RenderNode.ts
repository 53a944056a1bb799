/**
 * Render Nodes
 *
 * Paintable side of the dual tree. A render node owns its children, keeps the
 * properties the script set on it and receives bounds from the layout pass.
 */

import { EMPTY_RECT, type NativeValue, type Rect, rectEquals, type ViewId } from '../../shared';

/**
 * Closed set of render node kinds
 */
export type ViewKind =
  | 'generic'
  | 'text'
  | 'image'
  | 'scrollContainer'
  | 'scrollContent'
  | 'rawText';

/**
 * Paint backend receiving repaint requests
 */
export interface PaintSurface {
  repaint: (node: RenderNode) => void;
}

/**
 * Surface that ignores repaint requests (headless hosts)
 */
export const NOOP_SURFACE: PaintSurface = {
  repaint: () => {},
};

export class RenderNode {
  readonly id: ViewId;
  readonly kind: ViewKind;
  readonly children: RenderNode[] = [];
  readonly props = new Map<string, NativeValue>();
  parent: RenderNode | null = null;
  refId: string | null = null;
  bounds: Rect = { ...EMPTY_RECT };

  constructor(id: ViewId, kind: ViewKind = 'generic') {
    this.id = id;
    this.kind = kind;
  }

  setProperty(key: string, value: NativeValue): void {
    this.props.set(key, value);
    if (key === 'refId') {
      this.refId = value === null || value === undefined ? null : String(value);
    }
  }

  /**
   * Insert `child` at `index` (append when omitted or out of range).
   * A child that already has a parent is detached from it first.
   */
  addChild(child: RenderNode, index?: number): void {
    child.parent?.removeChild(child);
    if (index === undefined || index < 0 || index >= this.children.length) {
      this.children.push(child);
    } else {
      this.children.splice(index, 0, child);
    }
    child.parent = this;
  }

  removeChild(child: RenderNode): boolean {
    const index = this.children.indexOf(child);
    if (index === -1) return false;
    this.children.splice(index, 1);
    child.parent = null;
    return true;
  }

  /**
   * Apply bounds from the layout pass; returns whether they changed
   */
  setBounds(rect: Readonly<Rect>): boolean {
    if (rectEquals(this.bounds, rect)) return false;
    this.bounds = { ...rect };
    return true;
  }
}

/**
 * Text leaf. Has no geometry node of its own; the enclosing Text node lays it out.
 */
export class RawTextNode extends RenderNode {
  declare readonly kind: 'rawText';
  text: string;

  constructor(id: ViewId, text: string) {
    super(id, 'rawText');
    this.text = text;
  }
}

/**
 * Text container whose content is the concatenation of its raw text children
 */
export class TextNode extends RenderNode {
  declare readonly kind: 'text';

  constructor(id: ViewId) {
    super(id, 'text');
  }

  getTextContent(): string {
    let text = '';
    for (const child of this.children) {
      if (isRawTextNode(child)) text += child.text;
    }
    return text;
  }
}

export function isRawTextNode(node: RenderNode): node is RawTextNode {
  return node.kind === 'rawText' && node instanceof RawTextNode;
}

export function isTextNode(node: RenderNode): node is TextNode {
  return node.kind === 'text' && node instanceof TextNode;
}
