/**
 * Off-screen frame of brightness levels, one per grid cell.
 * Levels are clamped to 0-15; writes outside the grid are ignored.
 */

import { MAX_LEVEL, MIN_LEVEL, type GridSize } from '../types';
import type { LevelTarget } from '../utils/shapes';

export class FrameBuffer implements LevelTarget {
  readonly width: number;
  readonly height: number;
  private readonly levels: Uint8Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.levels = new Uint8Array(width * height);
  }

  static forGrid(grid: GridSize): FrameBuffer {
    return new FrameBuffer(grid.width, grid.height);
  }

  private inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  setLevel(x: number, y: number, level: number): void {
    if (!this.inBounds(x, y)) return;
    this.levels[y * this.width + x] = Math.max(MIN_LEVEL, Math.min(MAX_LEVEL, Math.round(level)));
  }

  getLevel(x: number, y: number): number {
    if (!this.inBounds(x, y)) return 0;
    return this.levels[y * this.width + x];
  }

  fill(level: number): void {
    this.levels.fill(Math.max(MIN_LEVEL, Math.min(MAX_LEVEL, Math.round(level))));
  }

  clear(): void {
    this.levels.fill(0);
  }

  isDark(): boolean {
    return this.levels.every((level) => level === 0);
  }

  /**
   * Levels row by row, top row first
   */
  toRows(): number[][] {
    const rows: number[][] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(Array.from(this.levels.subarray(y * this.width, (y + 1) * this.width)));
    }
    return rows;
  }

  copy(): FrameBuffer {
    const frame = new FrameBuffer(this.width, this.height);
    frame.levels.set(this.levels);
    return frame;
  }
}
