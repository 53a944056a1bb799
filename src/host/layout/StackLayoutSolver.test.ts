/**
 * Stack Layout Solver Tests
 */

import { describe, expect, test } from 'vitest';
import { GeometryNode, ScrollContentGeometryNode, TextGeometryNode } from '../views/GeometryNode';
import { StackLayoutSolver } from './StackLayoutSolver';

function node(id: number, style: Record<string, number | string> = {}): GeometryNode {
  const geometry = new GeometryNode(id);
  for (const [key, value] of Object.entries(style)) {
    geometry.setProperty(key, value);
  }
  return geometry;
}

describe('StackLayoutSolver', () => {
  const solver = new StackLayoutSolver();

  test('should give the root the viewport rect', () => {
    const root = node(0);
    solver.computeLayout(root, 320, 240);
    expect(root.layout).toEqual({ x: 0, y: 0, width: 320, height: 240 });
  });

  test('should stack a column and share remaining space by flex', () => {
    const root = node(0);
    const header = node(1, { height: 50 });
    const body = node(2, { flex: 1 });
    root.addChild(header);
    root.addChild(body);

    solver.computeLayout(root, 100, 200);

    expect(header.layout).toEqual({ x: 0, y: 0, width: 100, height: 50 });
    expect(body.layout).toEqual({ x: 0, y: 50, width: 100, height: 150 });
  });

  test('should split flex space proportionally', () => {
    const root = node(0);
    const a = node(1, { flex: 1 });
    const b = node(2, { flex: 3 });
    root.addChild(a);
    root.addChild(b);

    solver.computeLayout(root, 40, 100);

    expect(a.layout.height).toBe(25);
    expect(b.layout).toEqual({ x: 0, y: 25, width: 40, height: 75 });
  });

  test('should lay out rows with padding and margins', () => {
    const root = node(0, { flexDirection: 'row', padding: 10 });
    const a = node(1, { width: 30, margin: 5 });
    const b = node(2, { flex: 1, margin: 5 });
    root.addChild(a);
    root.addChild(b);

    solver.computeLayout(root, 200, 100);

    expect(a.layout).toEqual({ x: 15, y: 15, width: 30, height: 70 });
    expect(b.layout).toEqual({ x: 55, y: 15, width: 130, height: 70 });
  });

  test('should position children on the cross axis per alignItems', () => {
    const root = node(0, { alignItems: 'center' });
    const centered = node(1, { width: 40, height: 20 });
    root.addChild(centered);

    solver.computeLayout(root, 100, 100);
    expect(centered.layout).toEqual({ x: 30, y: 0, width: 40, height: 20 });

    root.setProperty('alignItems', 'end');
    solver.computeLayout(root, 100, 100);
    expect(centered.layout.x).toBe(60);
  });

  test('should size text from its content and wrap to the parent width', () => {
    const root = node(0);
    const text = new TextGeometryNode(1, { getTextContent: () => 'abcdefghij' });
    text.setProperty('fontSize', 10);
    root.addChild(text);

    solver.computeLayout(root, 20, 100);

    expect(text.layout).toEqual({ x: 0, y: 0, width: 20, height: 30 });
  });

  test('should size containers from their children when no size is given', () => {
    const root = node(0);
    const group = node(1, { padding: 2 });
    group.addChild(node(2, { height: 10 }));
    group.addChild(node(3, { height: 15 }));
    root.addChild(group);

    solver.computeLayout(root, 50, 100);

    expect(group.layout).toEqual({ x: 0, y: 0, width: 50, height: 29 });
    expect(group.children[1]?.layout).toEqual({ x: 2, y: 12, width: 46, height: 15 });
  });

  test('scroll content should grow past the space its parent hands out', () => {
    const root = node(0);
    const content = new ScrollContentGeometryNode(1);
    content.setProperty('flex', 1);
    content.addChild(node(2, { height: 40 }));
    content.addChild(node(3, { height: 40 }));
    root.addChild(content);

    const plain = node(4, { flex: 1 });
    plain.addChild(node(5, { height: 40 }));
    plain.addChild(node(6, { height: 40 }));
    const other = node(7);
    other.addChild(plain);

    solver.computeLayout(root, 100, 50);
    solver.computeLayout(other, 100, 50);

    expect(content.layout.height).toBe(80);
    expect(plain.layout.height).toBe(50);
  });

  test('should clamp sizes to min and max constraints', () => {
    const root = node(0);
    const capped = node(1, { flex: 1, maxHeight: 30, minWidth: 150 });
    root.addChild(capped);

    solver.computeLayout(root, 100, 100);

    expect(capped.layout).toEqual({ x: 0, y: 0, width: 150, height: 30 });
  });

  test('should clear dirty flags of every node it lays out', () => {
    const root = node(0);
    const child = node(1, { height: 10 });
    const grandchild = node(2);
    child.addChild(grandchild);
    root.addChild(child);

    solver.computeLayout(root, 10, 10);

    expect([root.dirty, child.dirty, grandchild.dirty]).toEqual([false, false, false]);
  });

  test('should produce the same layout for unchanged inputs', () => {
    const root = node(0, { padding: 3 });
    const a = node(1, { flex: 2 });
    const b = node(2, { height: 12, margin: 1 });
    root.addChild(a);
    root.addChild(b);

    solver.computeLayout(root, 90, 60);
    const first = [a.layout, b.layout];
    solver.computeLayout(root, 90, 60);

    expect([a.layout, b.layout]).toEqual(first);
  });
});
