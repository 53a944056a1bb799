/**
 * StackLayoutSolver - default single-axis stack solver
 *
 * Each container stacks its children along `flexDirection`. Children without an
 * explicit main size take their natural size; the remaining main-axis space is
 * shared between children with `flex > 0` in proportion to their flex factor.
 * On the cross axis children stretch unless `alignItems` says otherwise.
 * No shrinking: content that overflows its parent keeps its size.
 */

import type { GeometryNode, Size } from '../views/GeometryNode';
import type { LayoutSolver } from './types';

function clamp(value: number, min: number | undefined, max: number | undefined): number {
  let out = value;
  if (max !== undefined) out = Math.min(out, max);
  if (min !== undefined) out = Math.max(out, min);
  return out;
}

export class StackLayoutSolver implements LayoutSolver {
  computeLayout(root: GeometryNode, width: number, height: number): void {
    root.layout = { x: 0, y: 0, width, height };
    this.layoutChildren(root);
  }

  /**
   * Natural size of a subtree when given `availableWidth` horizontally
   */
  measureNode(node: GeometryNode, availableWidth: number): Size {
    const style = node.style;
    const pad = style.padding;
    let width: number;
    let height: number;

    const measured = node.measure(Math.max(0, (style.width ?? availableWidth) - pad * 2));
    if (measured) {
      width = measured.width + pad * 2;
      height = measured.height + pad * 2;
    } else {
      const row = style.flexDirection === 'row';
      const inner = Math.max(0, (style.width ?? availableWidth) - pad * 2);
      let main = 0;
      let cross = 0;
      for (const child of node.children) {
        const margin = child.style.margin;
        const size = this.measureNode(
          child,
          row ? Number.POSITIVE_INFINITY : Math.max(0, inner - margin * 2)
        );
        if (row) {
          main += size.width + margin * 2;
          cross = Math.max(cross, size.height + margin * 2);
        } else {
          main += size.height + margin * 2;
          cross = Math.max(cross, size.width + margin * 2);
        }
      }
      width = (row ? main : cross) + pad * 2;
      height = (row ? cross : main) + pad * 2;
    }

    if (style.width !== undefined) width = style.width;
    if (style.height !== undefined) height = style.height;

    return {
      width: clamp(width, style.minWidth, style.maxWidth),
      height: clamp(height, style.minHeight, style.maxHeight),
    };
  }

  private layoutChildren(node: GeometryNode): void {
    node.dirty = false;

    const style = node.style;
    const pad = style.padding;
    const row = style.flexDirection === 'row';
    const contentWidth = Math.max(0, node.layout.width - pad * 2);
    const contentHeight = Math.max(0, node.layout.height - pad * 2);
    const mainLength = row ? contentWidth : contentHeight;
    const crossLength = row ? contentHeight : contentWidth;

    // Pass 1: main-axis basis of every child
    const bases: number[] = [];
    let used = 0;
    let totalFlex = 0;
    for (const child of node.children) {
      const cs = child.style;
      const crossAvailable = Math.max(0, crossLength - cs.margin * 2);
      const explicitMain = row ? cs.width : cs.height;
      let basis: number;
      if (explicitMain !== undefined) {
        basis = explicitMain;
      } else if (cs.flex > 0) {
        basis = 0;
      } else {
        const natural = this.measureNode(
          child,
          row ? Number.POSITIVE_INFINITY : crossAvailable
        );
        basis = row ? natural.width : natural.height;
      }
      bases.push(basis);
      used += basis + cs.margin * 2;
      totalFlex += Math.max(0, cs.flex);
    }

    // Pass 2: distribute remaining space, place children
    const remaining = Math.max(0, mainLength - used);
    let cursor = pad;
    node.children.forEach((child, i) => {
      const cs = child.style;
      const margin = cs.margin;
      const crossAvailable = Math.max(0, crossLength - margin * 2);

      let main = bases[i] ?? 0;
      if (totalFlex > 0 && cs.flex > 0) {
        main += (remaining * cs.flex) / totalFlex;
      }
      if (child.growsWithContent) {
        const natural = this.measureNode(child, row ? Number.POSITIVE_INFINITY : crossAvailable);
        main = Math.max(main, row ? natural.width : natural.height);
      }
      main = row
        ? clamp(main, cs.minWidth, cs.maxWidth)
        : clamp(main, cs.minHeight, cs.maxHeight);

      const explicitCross = row ? cs.height : cs.width;
      let cross: number;
      if (explicitCross !== undefined) {
        cross = explicitCross;
      } else if (style.alignItems === 'stretch') {
        cross = crossAvailable;
      } else {
        const natural = this.measureNode(child, row ? Number.POSITIVE_INFINITY : crossAvailable);
        cross = row ? natural.height : natural.width;
      }
      cross = row
        ? clamp(cross, cs.minHeight, cs.maxHeight)
        : clamp(cross, cs.minWidth, cs.maxWidth);

      let crossOffset = pad + margin;
      if (style.alignItems === 'center') {
        crossOffset += (crossAvailable - cross) / 2;
      } else if (style.alignItems === 'end') {
        crossOffset += crossAvailable - cross;
      }
      const mainOffset = cursor + margin;

      child.layout = row
        ? { x: mainOffset, y: crossOffset, width: main, height: cross }
        : { x: crossOffset, y: mainOffset, width: cross, height: main };
      cursor += main + margin * 2;

      this.layoutChildren(child);
    });
  }
}
