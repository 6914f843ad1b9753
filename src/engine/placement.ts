/**
 * Placement Validation - Rules a shape must satisfy to become a live control
 *
 * Rules, checked in order:
 * 1. point-count / degenerate - the shape must have the points its kind needs
 *    and enclose at least one cell
 * 2. out-of-bounds - every point lies on the grid
 * 3. reserved-row - no lit cell on the bottom row (the meta key lives there)
 * 4. overlap - no shared point or crossing edge with any live control
 */

import {
  SHAPE_POINT_COUNT,
  type Control,
  type EditRejection,
  type GridSize,
  type Shape,
} from '../types';
import { isDegenerateShape, shapeWithinGrid, shapesOverlap, touchesRow } from '../utils/shapes';

export function describeShape(shape: Shape): string {
  const points = shape.points.map((p) => `(${p.x},${p.y})`).join(' ');
  return `${shape.kind} ${points}`;
}

/**
 * Live controls the shape would overlap, in map order
 */
export function findOverlaps(shape: Shape, controls: Iterable<Control>, ignoreId?: string): Control[] {
  const hits: Control[] = [];
  for (const control of controls) {
    if (control.id === ignoreId) continue;
    if (shapesOverlap(shape, control.shape)) {
      hits.push(control);
    }
  }
  return hits;
}

/**
 * Returns null when the shape may be placed, otherwise the first rule it breaks
 */
export function validatePlacement(
  shape: Shape,
  controls: Iterable<Control>,
  grid: GridSize,
  ignoreId?: string
): EditRejection | null {
  const label = describeShape(shape);

  if (shape.points.length !== SHAPE_POINT_COUNT[shape.kind]) {
    return {
      reason: 'point-count',
      message: `A ${shape.kind} needs ${SHAPE_POINT_COUNT[shape.kind]} points, got ${shape.points.length}`,
    };
  }

  if (isDegenerateShape(shape)) {
    return { reason: 'degenerate', message: `Cannot create ${label}: it encloses no cells` };
  }

  if (!shapeWithinGrid(shape, grid)) {
    return {
      reason: 'out-of-bounds',
      message: `Cannot create ${label}: outside the ${grid.width}x${grid.height} grid`,
    };
  }

  if (touchesRow(shape, grid.height - 1)) {
    return { reason: 'reserved-row', message: `Cannot create ${label}: the bottom row is reserved` };
  }

  const overlaps = findOverlaps(shape, controls, ignoreId);
  if (overlaps.length > 0) {
    return {
      reason: 'overlap',
      message: `Cannot create overlapping ${label}: overlaps ${overlaps.map((c) => c.id).join(', ')}`,
    };
  }

  return null;
}
