/**
 * k-d Tree Tests
 *
 * Nearest-neighbour queries checked against a brute-force scan.
 */

import { describe, it, expect } from 'vitest';
import seedrandom from 'seedrandom';
import { KdTree } from '../../src/engine/kdtree';
import type { Vec2 } from '../../src/engine/types';
import { distance } from '../../src/engine/vec2';

describe('KdTree', () => {
  it('returns null while empty', () => {
    const tree = new KdTree();
    expect(tree.nearest({ x: 0, y: 0 })).toBeNull();
  });

  it('single point is always the nearest', () => {
    const tree = new KdTree();
    tree.insert({ x: 3, y: 4 });
    const result = tree.nearest({ x: 0, y: 0 });
    expect(result?.point).toEqual({ x: 3, y: 4 });
    expect(result?.distance).toBe(5);
  });

  it('finds the closer of two points', () => {
    const tree = new KdTree();
    tree.insert({ x: 0, y: 0 });
    tree.insert({ x: 1, y: 0 });
    expect(tree.nearest({ x: 0.9, y: 0.1 })?.point).toEqual({ x: 1, y: 0 });
    expect(tree.nearest({ x: 0.2, y: -0.1 })?.point).toEqual({ x: 0, y: 0 });
  });

  it('exact hit has zero distance', () => {
    const tree = new KdTree();
    tree.insert({ x: -0.3, y: 0.2 });
    tree.insert({ x: 0.5, y: 0.5 });
    expect(tree.nearest({ x: -0.3, y: 0.2 })?.distance).toBe(0);
  });

  it('does not keep a reference to the inserted object', () => {
    const tree = new KdTree();
    const p = { x: 1, y: 1 };
    tree.insert(p);
    p.x = 100;
    expect(tree.nearest({ x: 1, y: 1 })?.distance).toBe(0);
  });

  it('matches brute force on random point sets', () => {
    const rng = seedrandom('kdtree');
    for (let trial = 0; trial < 20; trial++) {
      const tree = new KdTree();
      const points: Vec2[] = [];
      for (let i = 0; i < 25; i++) {
        const p = { x: rng() * 2 - 1, y: rng() * 2 - 1 };
        points.push(p);
        tree.insert(p);
      }
      for (let q = 0; q < 10; q++) {
        const query = { x: rng() * 2 - 1, y: rng() * 2 - 1 };
        const expected = Math.min(...points.map((p) => distance(p, query)));
        expect(tree.nearest(query)?.distance).toBeCloseTo(expected, 12);
      }
    }
  });
});
