import type { StateCreator } from 'zustand';
import type { Control } from '../../types';
import type { EditorStoreState } from '../types';

// =============================================================================
// Selection Slice - At most one selected control, held by ID
// =============================================================================

export interface SelectionSlice {
  // State
  selectedControlId: string | null;

  // Actions
  selectControl: (id: string | null) => void;
  clearSelection: () => void;

  // Queries
  getSelectedControl: () => Control | null;
}

export const createSelectionSlice: StateCreator<
  EditorStoreState,
  [],
  [],
  SelectionSlice
> = (set, get) => ({
  // Initial state
  selectedControlId: null,

  // Actions
  selectControl: (id) =>
    set((state) => ({
      selectedControlId: id !== null && state.controls.has(id) ? id : null,
    })),

  clearSelection: () =>
    set({ selectedControlId: null }),

  // An ID that no longer resolves reads as no selection
  getSelectedControl: () => {
    const { selectedControlId, controls } = get();
    if (selectedControlId === null) {
      return null;
    }
    return controls.get(selectedControlId) ?? null;
  },
});
