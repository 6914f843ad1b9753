import type { FrameBuffer } from '../render/FrameBuffer';

// One character per level, dark to bright
const LEVEL_CHARS = ' .:-=+*#%@ABCDEF';

/**
 * Text rendering of a frame: one line per row, one character per cell
 */
export function renderFrameAscii(frame: FrameBuffer): string {
  return frame
    .toRows()
    .map((row) => row.map((level) => LEVEL_CHARS[level] ?? '?').join(''))
    .join('\n');
}

/**
 * Hex rendering (0-f per cell), handy in assertions
 */
export function renderFrameHex(frame: FrameBuffer): string[] {
  return frame.toRows().map((row) => row.map((level) => level.toString(16)).join(''));
}
