/**
 * Grid shape geometry
 *
 * Hit-testing, drawing and overlap detection for the three shape kinds a
 * control can be built from. All coordinates are integer grid cells.
 *
 * Degenerate input (a triangle with collinear vertices, a shape with fewer
 * points than its kind needs) never throws: hit-tests report false and
 * drawing lights nothing.
 */

import {
  SHAPE_POINT_COUNT,
  type CellBounds,
  type GridPoint,
  type GridSize,
  type PointShape,
  type RectangleShape,
  type Segment,
  type Shape,
  type TriangleShape,
} from '../types';

/**
 * Anything a shape can be drawn into (a frame buffer, a test recorder)
 */
export interface LevelTarget {
  setLevel(x: number, y: number, level: number): void;
}

// =============================================================================
// Construction
// =============================================================================

export function createPointShape(p: GridPoint): PointShape {
  return { kind: 'point', points: [{ ...p }] };
}

/**
 * Corners are stored as (min, min) / (max, max) regardless of press order
 */
export function createRectangleShape(a: GridPoint, b: GridPoint): RectangleShape {
  return {
    kind: 'rectangle',
    points: [
      { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
      { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) },
    ],
  };
}

export function createTriangleShape(a: GridPoint, b: GridPoint, c: GridPoint): TriangleShape {
  return { kind: 'triangle', points: [{ ...a }, { ...b }, { ...c }] };
}

/**
 * Build a shape from a press gesture: 1 point, 2 corners or 3 vertices.
 * Any other count has no shape.
 */
export function shapeFromPoints(points: GridPoint[]): Shape | null {
  switch (points.length) {
    case 1:
      return createPointShape(points[0]);
    case 2:
      return createRectangleShape(points[0], points[1]);
    case 3:
      return createTriangleShape(points[0], points[1], points[2]);
    default:
      return null;
  }
}

export function cloneShape<S extends Shape>(shape: S): S {
  return { ...shape, points: shape.points.map((p) => ({ ...p })) };
}

/**
 * Move every point by (dx, dy). The kind never changes.
 */
export function translateShape<S extends Shape>(shape: S, dx: number, dy: number): S {
  return { ...shape, points: shape.points.map((p) => ({ x: p.x + dx, y: p.y + dy })) };
}

// =============================================================================
// Queries
// =============================================================================

// Twice the signed area of (a, b, c); the sign gives the orientation
function cross(p: GridPoint, a: GridPoint, b: GridPoint): number {
  return (p.x - b.x) * (a.y - b.y) - (a.x - b.x) * (p.y - b.y);
}

/**
 * True when the shape has fewer points than its kind needs, or is a
 * triangle with zero area
 */
export function isDegenerateShape(shape: Shape): boolean {
  if (shape.points.length < SHAPE_POINT_COUNT[shape.kind]) {
    return true;
  }
  if (shape.kind === 'triangle') {
    const [a, b, c] = shape.points;
    return cross(a, b, c) === 0;
  }
  return false;
}

export function shapeBounds(shape: Shape): CellBounds | null {
  if (shape.points.length === 0) {
    return null;
  }
  const xs = shape.points.map((p) => p.x);
  const ys = shape.points.map((p) => p.y);
  return {
    minX: Math.min(...xs),
    minY: Math.min(...ys),
    maxX: Math.max(...xs),
    maxY: Math.max(...ys),
  };
}

/**
 * Outline vertices used for overlap checks. A rectangle contributes all
 * four corners of its box; the other kinds use their recorded points.
 */
export function shapeVertices(shape: Shape): GridPoint[] {
  if (shape.kind === 'rectangle' && shape.points.length >= 2) {
    const bounds = shapeBounds(shape);
    if (bounds) {
      return [
        { x: bounds.minX, y: bounds.minY },
        { x: bounds.maxX, y: bounds.minY },
        { x: bounds.maxX, y: bounds.maxY },
        { x: bounds.minX, y: bounds.maxY },
      ];
    }
  }
  return shape.points;
}

export function containsPoint(shape: Shape, x: number, y: number): boolean {
  if (isDegenerateShape(shape)) {
    return false;
  }

  switch (shape.kind) {
    case 'point': {
      const [p] = shape.points;
      return p.x === x && p.y === y;
    }
    case 'rectangle': {
      const [a, b] = shape.points;
      return (
        x >= Math.min(a.x, b.x) &&
        x <= Math.max(a.x, b.x) &&
        y >= Math.min(a.y, b.y) &&
        y <= Math.max(a.y, b.y)
      );
    }
    case 'triangle': {
      // Inside when no two edge orientations disagree; a cell on an edge counts
      const [a, b, c] = shape.points;
      const p = { x, y };
      const d1 = cross(p, a, b);
      const d2 = cross(p, b, c);
      const d3 = cross(p, c, a);
      const hasNegative = d1 < 0 || d2 < 0 || d3 < 0;
      const hasPositive = d1 > 0 || d2 > 0 || d3 > 0;
      return !(hasNegative && hasPositive);
    }
  }
}

/**
 * Every cell the shape lights, row by row
 */
export function shapeCells(shape: Shape): GridPoint[] {
  const bounds = shapeBounds(shape);
  if (!bounds || isDegenerateShape(shape)) {
    return [];
  }

  const cells: GridPoint[] = [];
  for (let y = bounds.minY; y <= bounds.maxY; y++) {
    for (let x = bounds.minX; x <= bounds.maxX; x++) {
      if (containsPoint(shape, x, y)) {
        cells.push({ x, y });
      }
    }
  }
  return cells;
}

export function drawShape(shape: Shape, level: number, target: LevelTarget): void {
  for (const cell of shapeCells(shape)) {
    target.setLevel(cell.x, cell.y, level);
  }
}

/**
 * Check that every point sits on a grid of the given size, optionally
 * keeping clear of the bottom row
 */
export function shapeWithinGrid(shape: Shape, grid: GridSize, excludeBottomRow = false): boolean {
  const maxY = excludeBottomRow ? grid.height - 2 : grid.height - 1;
  return shape.points.every((p) => p.x >= 0 && p.x < grid.width && p.y >= 0 && p.y <= maxY);
}

export function touchesRow(shape: Shape, row: number): boolean {
  return shapeCells(shape).some((cell) => cell.y === row) || shape.points.some((p) => p.y === row);
}

// =============================================================================
// Overlap
// =============================================================================

/**
 * Closed outline: point i joins point (i + 1) mod N. Fewer than two points
 * have no edges.
 */
export function shapeEdges(points: GridPoint[]): Segment[] {
  if (points.length < 2) {
    return [];
  }
  return points.map((a, i) => ({ a, b: points[(i + 1) % points.length] }));
}

function ccw(a: GridPoint, b: GridPoint, c: GridPoint): boolean {
  return (c.y - a.y) * (b.x - a.x) > (b.y - a.y) * (c.x - a.x);
}

/**
 * Segments cross when each one's endpoints straddle the other's line
 */
export function segmentsIntersect(s1: Segment, s2: Segment): boolean {
  return (
    ccw(s1.a, s2.a, s2.b) !== ccw(s1.b, s2.a, s2.b) &&
    ccw(s1.a, s1.b, s2.a) !== ccw(s1.a, s1.b, s2.b)
  );
}

/**
 * Two shapes overlap when a vertex of either lies inside the other, or any
 * pair of their edges crosses. Both checks are needed: a small shape can sit
 * wholly inside a larger one with no crossing, and two shapes can cross with
 * no vertex inside the other.
 */
export function shapesOverlap(s1: Shape, s2: Shape): boolean {
  const v1 = shapeVertices(s1);
  const v2 = shapeVertices(s2);

  if (v1.some((p) => containsPoint(s2, p.x, p.y))) return true;
  if (v2.some((p) => containsPoint(s1, p.x, p.y))) return true;

  const edges1 = shapeEdges(v1);
  const edges2 = shapeEdges(v2);
  for (const e1 of edges1) {
    for (const e2 of edges2) {
      if (segmentsIntersect(e1, e2)) {
        return true;
      }
    }
  }

  return false;
}
