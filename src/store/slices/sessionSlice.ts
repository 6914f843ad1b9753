import type { StateCreator } from 'zustand';
import type { GridSize } from '../../types';
import type { EditorStoreState } from '../types';
import { debug } from '../../utils/debug';

// =============================================================================
// Session Slice - Grid dimensions and whole-editor reset
// =============================================================================

export interface SessionSlice {
  // State
  grid: GridSize;

  // Actions
  setGrid: (grid: GridSize) => void;
  reset: () => void;
}

export const createSessionSlice =
  (initialGrid: GridSize): StateCreator<EditorStoreState, [], [], SessionSlice> =>
  (set) => ({
    // Initial state
    grid: { ...initialGrid },

    // Actions
    setGrid: (grid) =>
      set({ grid: { width: grid.width, height: grid.height } }),

    // Clipboard is kept so a copied control survives a reconnect
    reset: () => {
      debug('session', 'Editor state reset');
      set({
        controls: new Map(),
        lastRejection: null,
        selectedControlId: null,
        pendingPoints: [],
        mode: 'normal',
        metaHistory: [],
        lastCopyDeletePress: null,
        pressTouch: null,
      });
    },
  });
