import type { StateCreator } from 'zustand';
import type { Control, EditResult } from '../../types';
import type { EditorStoreState } from '../types';
import { cloneControl } from '../../engine/controls';
import { translateShape } from '../../utils/shapes';
import { debug } from '../../utils/debug';

// =============================================================================
// Clipboard Slice - Single-slot copy of one control
// =============================================================================

export interface ClipboardSlice {
  // State
  clipboard: Control | null;

  // Actions
  copyControl: (id: string) => boolean;
  pasteAt: (x: number, y: number) => EditResult;
  clearClipboard: () => void;
}

export const createClipboardSlice: StateCreator<
  EditorStoreState,
  [],
  [],
  ClipboardSlice
> = (set, get) => ({
  // Initial state
  clipboard: null,

  // Actions
  copyControl: (id) => {
    const control = get().controls.get(id);
    if (!control) {
      return false;
    }
    set({ clipboard: cloneControl(control, control.id) });
    debug('edit', `Copied ${id}`);
    return true;
  },

  // Translates the copy so its first point lands on (x, y)
  pasteAt: (x, y) => {
    const { clipboard } = get();
    if (!clipboard) {
      return get().rejectEdit({ reason: 'empty-clipboard', message: 'Nothing to paste' });
    }

    const [anchor] = clipboard.shape.points;
    if (!anchor) {
      return get().rejectEdit({ reason: 'point-count', message: `Clipboard ${clipboard.id} has no points` });
    }

    const pasted = cloneControl(clipboard, get().newControlId());
    pasted.shape = translateShape(clipboard.shape, x - anchor.x, y - anchor.y);

    const result = get().placeControl(pasted);
    if (result.ok) {
      debug('edit', `Pasted ${clipboard.id} as ${pasted.id} at (${x},${y})`);
    }
    return result;
  },

  clearClipboard: () =>
    set({ clipboard: null }),
});
