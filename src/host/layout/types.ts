/**
 * Layout solver contract
 */

import type { GeometryNode } from '../views/GeometryNode';

/**
 * Computes `layout` for every node reachable from `root`, given the viewport
 * size. Rects are relative to the parent node. Must be a pure function of the
 * tree's styles and the viewport, and must clear `dirty` on each node it lays out.
 */
export interface LayoutSolver {
  computeLayout: (root: GeometryNode, width: number, height: number) => void;
}
