/**
 * 2D k-d tree — nearest-neighbour index for placement sampling.
 *
 * Insert-only. Splits alternate between x (even depth) and y (odd depth).
 * Sizes here are tiny (ball + a handful of robots) so no rebalancing.
 */

import type { Vec2, NearestResult, SpatialIndex } from './types';
import { distanceSq } from './vec2';

interface KdNode {
  point: Vec2;
  left: KdNode | null;
  right: KdNode | null;
}

export class KdTree implements SpatialIndex {
  private root: KdNode | null = null;

  insert(point: Vec2): void {
    const node: KdNode = { point: { x: point.x, y: point.y }, left: null, right: null };

    if (!this.root) {
      this.root = node;
      return;
    }

    let current = this.root;
    let depth = 0;
    for (;;) {
      const goLeft = depth % 2 === 0 ? point.x < current.point.x : point.y < current.point.y;
      if (goLeft) {
        if (!current.left) {
          current.left = node;
          return;
        }
        current = current.left;
      } else {
        if (!current.right) {
          current.right = node;
          return;
        }
        current = current.right;
      }
      depth++;
    }
  }

  nearest(point: Vec2): NearestResult | null {
    if (!this.root) return null;

    let best: KdNode = this.root;
    let bestDistSq = distanceSq(point, this.root.point);

    const search = (node: KdNode | null, depth: number): void => {
      if (!node) return;

      const dSq = distanceSq(point, node.point);
      if (dSq < bestDistSq) {
        best = node;
        bestDistSq = dSq;
      }

      const axisDelta = depth % 2 === 0 ? point.x - node.point.x : point.y - node.point.y;
      const near = axisDelta < 0 ? node.left : node.right;
      const far = axisDelta < 0 ? node.right : node.left;

      search(near, depth + 1);
      // Only cross the splitting plane if it is closer than the current best
      if (axisDelta * axisDelta < bestDistSq) {
        search(far, depth + 1);
      }
    };

    search(this.root, 0);
    return { point: best.point, distance: Math.sqrt(bestDistSq) };
  }
}
