/**
 * Meta UI placement
 *
 * While meta mode is held and a control is selected, three affordance cells
 * sit beside the control:
 *
 *   [+][-]     increment at the anchor, decrement one to the right
 *   [c]        copy/delete one below the anchor
 *
 * The anchor is one cell right of the shape's rightmost point, on its
 * topmost row. If the pair would run off the right edge it moves to the
 * left of the shape instead.
 */

import type { GridPoint, GridSize, MetaUiCells, Shape } from '../types';
import { shapeBounds } from '../utils/shapes';

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * Anchor (increment) cell, or null when the grid is too small to hold the
 * affordances above its bottom row
 */
export function getMetaUiPosition(shape: Shape, grid: GridSize): GridPoint | null {
  const bounds = shapeBounds(shape);
  if (!bounds || grid.width < 2 || grid.height < 3) {
    return null;
  }

  let x = bounds.maxX + 1;
  if (x + 1 > grid.width - 1) {
    x = bounds.minX - 2;
  }

  return {
    x: clamp(x, 0, grid.width - 2),
    // copy/delete sits one row below, and neither row may be the bottom one
    y: clamp(bounds.minY, 0, grid.height - 3),
  };
}

export function getMetaUiCells(shape: Shape, grid: GridSize): MetaUiCells | null {
  const anchor = getMetaUiPosition(shape, grid);
  if (!anchor) {
    return null;
  }
  return {
    increment: anchor,
    decrement: { x: anchor.x + 1, y: anchor.y },
    copyDelete: { x: anchor.x, y: anchor.y + 1 },
  };
}

export const sameCell = (a: GridPoint, b: GridPoint): boolean => a.x === b.x && a.y === b.y;

/**
 * The reserved meta key: bottom-left cell
 */
export function getMetaKey(grid: GridSize): GridPoint {
  return { x: 0, y: grid.height - 1 };
}

export function isMetaKey(x: number, y: number, grid: GridSize): boolean {
  return x === 0 && y === grid.height - 1;
}

export function isReservedRow(y: number, grid: GridSize): boolean {
  return y === grid.height - 1;
}
