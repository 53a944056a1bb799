/**
 * View Factory Registry
 *
 * Maps script-visible type identifiers to factories producing a
 * (render node, geometry node) pair. Only registered types can be created.
 */

import type { ViewId } from '../shared';
import { UnknownViewTypeError, ViewTypeAlreadyRegisteredError } from './engine/types';
import { GeometryNode, ScrollContentGeometryNode, TextGeometryNode } from './views/GeometryNode';
import { RenderNode, TextNode } from './views/RenderNode';

/**
 * A render node with its optional geometry counterpart
 */
export interface ViewPair {
  render: RenderNode;
  geometry: GeometryNode | null;
}

/**
 * Builds the node pair for a freshly allocated id
 */
export type ViewFactory = (id: ViewId) => ViewPair;

export class ViewFactoryRegistry {
  private factories = new Map<string, ViewFactory>();

  /**
   * Register a view type
   *
   * @throws ViewTypeAlreadyRegisteredError when `typeId` is taken
   */
  register(typeId: string, factory: ViewFactory): void {
    if (this.factories.has(typeId)) {
      throw new ViewTypeAlreadyRegisteredError(typeId);
    }
    this.factories.set(typeId, factory);
  }

  /**
   * Get a factory
   *
   * @throws UnknownViewTypeError when `typeId` is not registered
   */
  get(typeId: string): ViewFactory {
    const factory = this.factories.get(typeId);
    if (!factory) {
      throw new UnknownViewTypeError(typeId);
    }
    return factory;
  }

  has(typeId: string): boolean {
    return this.factories.has(typeId);
  }

  /**
   * Get all registered type identifiers
   */
  getRegisteredNames(): string[] {
    return Array.from(this.factories.keys());
  }

  get size(): number {
    return this.factories.size;
  }
}

/**
 * Built-in view types available to every controller
 */
export const BUILTIN_VIEW_TYPES: Readonly<Record<string, ViewFactory>> = {
  View: (id) => ({ render: new RenderNode(id, 'generic'), geometry: new GeometryNode(id) }),
  Text: (id) => {
    const render = new TextNode(id);
    return { render, geometry: new TextGeometryNode(id, render) };
  },
  Image: (id) => ({ render: new RenderNode(id, 'image'), geometry: new GeometryNode(id) }),
  ScrollView: (id) => ({
    render: new RenderNode(id, 'scrollContainer'),
    geometry: new GeometryNode(id),
  }),
  ScrollViewContentView: (id) => ({
    render: new RenderNode(id, 'scrollContent'),
    geometry: new ScrollContentGeometryNode(id),
  }),
};

/**
 * Register the built-in view types, skipping any already present
 */
export function installBuiltinViewTypes(registry: ViewFactoryRegistry): void {
  for (const [typeId, factory] of Object.entries(BUILTIN_VIEW_TYPES)) {
    if (!registry.has(typeId)) {
      registry.register(typeId, factory);
    }
  }
}
