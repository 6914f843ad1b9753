/**
 * Tests for grid shape geometry
 */

import { describe, it, expect } from 'vitest';
import {
  containsPoint,
  createPointShape,
  createRectangleShape,
  createTriangleShape,
  drawShape,
  isDegenerateShape,
  segmentsIntersect,
  shapeBounds,
  shapeCells,
  shapeEdges,
  shapeFromPoints,
  shapeVertices,
  shapesOverlap,
  translateShape,
  type LevelTarget,
} from '../../../src/utils/shapes';
import type { Shape } from '../../../src/types';

const recorder = () => {
  const cells: string[] = [];
  const target: LevelTarget = {
    setLevel: (x, y, level) => {
      cells.push(`${x},${y}=${level}`);
    },
  };
  return { cells, target };
};

describe('shapes', () => {
  describe('construction', () => {
    it('normalises rectangle corners regardless of press order', () => {
      const rect = createRectangleShape({ x: 3, y: 1 }, { x: 1, y: 3 });
      expect(rect.points).toEqual([{ x: 1, y: 1 }, { x: 3, y: 3 }]);
    });

    it('builds a shape from 1, 2 or 3 points', () => {
      expect(shapeFromPoints([{ x: 0, y: 0 }])?.kind).toBe('point');
      expect(shapeFromPoints([{ x: 0, y: 0 }, { x: 1, y: 1 }])?.kind).toBe('rectangle');
      expect(shapeFromPoints([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }])?.kind).toBe('triangle');
    });

    it('has no shape for 0 or 4 points', () => {
      expect(shapeFromPoints([])).toBeNull();
      expect(shapeFromPoints([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 3, y: 0 }])).toBeNull();
    });

    it('translates without changing kind', () => {
      const tri = createTriangleShape({ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 });
      const moved = translateShape(tri, 3, 1);
      expect(moved.kind).toBe('triangle');
      expect(moved.points).toEqual([{ x: 3, y: 1 }, { x: 5, y: 1 }, { x: 3, y: 3 }]);
      expect(tri.points[0]).toEqual({ x: 0, y: 0 });
    });
  });

  describe('containsPoint', () => {
    it('matches a point exactly', () => {
      const point = createPointShape({ x: 2, y: 5 });
      expect(containsPoint(point, 2, 5)).toBe(true);
      expect(containsPoint(point, 2, 4)).toBe(false);
    });

    it('tests a rectangle inclusively', () => {
      const rect = createRectangleShape({ x: 1, y: 1 }, { x: 3, y: 3 });
      expect(containsPoint(rect, 1, 1)).toBe(true);
      expect(containsPoint(rect, 3, 3)).toBe(true);
      expect(containsPoint(rect, 2, 2)).toBe(true);
      expect(containsPoint(rect, 4, 2)).toBe(false);
      expect(containsPoint(rect, 0, 0)).toBe(false);
    });

    it('ignores corner order for rectangles built by hand', () => {
      const rect: Shape = { kind: 'rectangle', points: [{ x: 3, y: 3 }, { x: 1, y: 1 }] };
      expect(containsPoint(rect, 2, 2)).toBe(true);
    });

    it('tests a triangle by edge orientation', () => {
      const tri = createTriangleShape({ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 4 });
      expect(containsPoint(tri, 1, 1)).toBe(true);
      expect(containsPoint(tri, 2, 2)).toBe(true); // on the hypotenuse
      expect(containsPoint(tri, 3, 3)).toBe(false);
    });

    it('works for either winding', () => {
      const tri = createTriangleShape({ x: 0, y: 0 }, { x: 0, y: 4 }, { x: 4, y: 0 });
      expect(containsPoint(tri, 1, 1)).toBe(true);
      expect(containsPoint(tri, 3, 3)).toBe(false);
    });

    it('reports false for a collinear triangle', () => {
      const tri = createTriangleShape({ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 });
      expect(isDegenerateShape(tri)).toBe(true);
      expect(containsPoint(tri, 1, 1)).toBe(false);
    });

    it('reports false for a triangle with missing vertices', () => {
      const tri: Shape = { kind: 'triangle', points: [{ x: 0, y: 0 }, { x: 3, y: 0 }] };
      expect(containsPoint(tri, 1, 0)).toBe(false);
      expect(containsPoint(tri, 0, 0)).toBe(false);
    });
  });

  describe('drawShape', () => {
    it('lights one cell for a point', () => {
      const { cells, target } = recorder();
      drawShape(createPointShape({ x: 4, y: 2 }), 9, target);
      expect(cells).toEqual(['4,2=9']);
    });

    it('fills the rectangle bounding box', () => {
      const { cells, target } = recorder();
      drawShape(createRectangleShape({ x: 1, y: 1 }, { x: 2, y: 2 }), 5, target);
      expect(cells).toEqual(['1,1=5', '2,1=5', '1,2=5', '2,2=5']);
    });

    it('lights only the cells inside a triangle', () => {
      const tri = createTriangleShape({ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 4 });
      expect(shapeCells(tri)).toHaveLength(15);
      expect(shapeCells(tri).every(({ x, y }) => x + y <= 4)).toBe(true);
    });

    it('draws nothing for a degenerate triangle', () => {
      const { cells, target } = recorder();
      drawShape(createTriangleShape({ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 4, y: 0 }), 15, target);
      expect(cells).toEqual([]);
    });
  });

  describe('edges and bounds', () => {
    it('joins each point to the next, wrapping around', () => {
      const edges = shapeEdges([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }]);
      expect(edges).toEqual([
        { a: { x: 0, y: 0 }, b: { x: 2, y: 0 } },
        { a: { x: 2, y: 0 }, b: { x: 0, y: 2 } },
        { a: { x: 0, y: 2 }, b: { x: 0, y: 0 } },
      ]);
    });

    it('has no edges for a single point', () => {
      expect(shapeEdges([{ x: 1, y: 1 }])).toEqual([]);
    });

    it('outlines a rectangle with its four corners', () => {
      const rect = createRectangleShape({ x: 1, y: 2 }, { x: 4, y: 3 });
      expect(shapeVertices(rect)).toEqual([
        { x: 1, y: 2 },
        { x: 4, y: 2 },
        { x: 4, y: 3 },
        { x: 1, y: 3 },
      ]);
    });

    it('computes bounds from all points', () => {
      const tri = createTriangleShape({ x: 5, y: 1 }, { x: 2, y: 4 }, { x: 6, y: 3 });
      expect(shapeBounds(tri)).toEqual({ minX: 2, minY: 1, maxX: 6, maxY: 4 });
    });
  });

  describe('segmentsIntersect', () => {
    it('detects crossing diagonals', () => {
      expect(
        segmentsIntersect({ a: { x: 0, y: 0 }, b: { x: 4, y: 4 } }, { a: { x: 0, y: 4 }, b: { x: 4, y: 0 } })
      ).toBe(true);
    });

    it('rejects parallel segments', () => {
      expect(
        segmentsIntersect({ a: { x: 0, y: 0 }, b: { x: 1, y: 0 } }, { a: { x: 0, y: 2 }, b: { x: 1, y: 2 } })
      ).toBe(false);
    });

    it('rejects segments that would only meet if extended', () => {
      expect(
        segmentsIntersect({ a: { x: 0, y: 0 }, b: { x: 1, y: 1 } }, { a: { x: 3, y: 0 }, b: { x: 3, y: 5 } })
      ).toBe(false);
    });
  });

  describe('shapesOverlap', () => {
    const rect = createRectangleShape({ x: 1, y: 1 }, { x: 3, y: 3 });

    it('detects a small shape inside a larger one', () => {
      expect(shapesOverlap(rect, createPointShape({ x: 2, y: 2 }))).toBe(true);
      expect(shapesOverlap(createPointShape({ x: 2, y: 2 }), rect)).toBe(true);
    });

    it('detects shapes sharing a single cell', () => {
      expect(shapesOverlap(rect, createRectangleShape({ x: 3, y: 3 }, { x: 5, y: 5 }))).toBe(true);
    });

    it('detects crossing bars with no vertex inside the other', () => {
      const horizontal = createRectangleShape({ x: 0, y: 2 }, { x: 6, y: 3 });
      const vertical = createRectangleShape({ x: 2, y: 0 }, { x: 3, y: 6 });

      const vertexInside =
        shapeVertices(horizontal).some((p) => containsPoint(vertical, p.x, p.y)) ||
        shapeVertices(vertical).some((p) => containsPoint(horizontal, p.x, p.y));
      expect(vertexInside).toBe(false);
      expect(shapesOverlap(horizontal, vertical)).toBe(true);
    });

    it('reports separate shapes as not overlapping', () => {
      const tri = createTriangleShape({ x: 5, y: 0 }, { x: 7, y: 0 }, { x: 5, y: 2 });
      expect(shapesOverlap(rect, tri)).toBe(false);
      expect(shapesOverlap(rect, createPointShape({ x: 5, y: 5 }))).toBe(false);
    });

    it('agrees with containment and edge crossing when there is no overlap', () => {
      const shapes: Shape[] = [
        createPointShape({ x: 0, y: 0 }),
        createPointShape({ x: 6, y: 6 }),
        createRectangleShape({ x: 2, y: 0 }, { x: 3, y: 1 }),
        createTriangleShape({ x: 5, y: 0 }, { x: 7, y: 0 }, { x: 7, y: 2 }),
        createTriangleShape({ x: 0, y: 3 }, { x: 2, y: 5 }, { x: 0, y: 6 }),
      ];

      for (const s1 of shapes) {
        for (const s2 of shapes) {
          if (s1 === s2) continue;
          expect(shapesOverlap(s1, s2)).toBe(false);
          expect(shapeVertices(s1).some((p) => containsPoint(s2, p.x, p.y))).toBe(false);
          for (const e1 of shapeEdges(shapeVertices(s1))) {
            for (const e2 of shapeEdges(shapeVertices(s2))) {
              expect(segmentsIntersect(e1, e2)).toBe(false);
            }
          }
        }
      }
    });
  });
});
