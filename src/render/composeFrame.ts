/**
 * Frame composition
 *
 * Draws one snapshot of the editor into a frame, back to front:
 * controls in map order, in-progress gesture points, the meta key, and
 * (meta mode with a selection only) the increment / decrement / copy-delete
 * affordances.
 */

import type { EditorConfig } from '../config/defaults';
import type { Control, GridPoint, GridSize, InteractionMode } from '../types';
import { drawControl } from '../engine/controls';
import { getMetaKey, getMetaUiCells } from '../editor/metaUi';
import { FrameBuffer } from './FrameBuffer';

/**
 * The parts of editor state a frame is drawn from
 */
export interface FrameSource {
  grid: GridSize;
  controls: Map<string, Control>;
  pendingPoints: GridPoint[];
  mode: InteractionMode;
  selectedControlId: string | null;
}

export function composeFrame(
  source: FrameSource,
  config: EditorConfig,
  now: number,
  frame: FrameBuffer = FrameBuffer.forGrid(source.grid)
): FrameBuffer {
  frame.clear();

  const brightness = {
    policy: config.brightnessPolicy,
    flashDurationMs: config.flashDurationMs,
    flashSteps: config.flashSteps,
  };
  for (const control of source.controls.values()) {
    drawControl(control, frame, brightness, now);
  }

  for (const point of source.pendingPoints) {
    frame.setLevel(point.x, point.y, config.pendingPointLevel);
  }

  const metaKey = getMetaKey(source.grid);
  const metaActive = source.mode === 'meta';
  frame.setLevel(metaKey.x, metaKey.y, metaActive ? config.metaKeyActiveLevel : config.metaKeyIdleLevel);

  const selected = source.selectedControlId === null ? undefined : source.controls.get(source.selectedControlId);
  if (metaActive && selected) {
    const cells = getMetaUiCells(selected.shape, source.grid);
    if (cells) {
      const levels = config.affordanceLevels;
      frame.setLevel(cells.increment.x, cells.increment.y, levels.increment);
      frame.setLevel(cells.decrement.x, cells.decrement.y, levels.decrement);
      frame.setLevel(cells.copyDelete.x, cells.copyDelete.y, levels.copyDelete);
    }
  }

  return frame;
}
