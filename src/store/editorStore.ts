import { createStore, type StoreApi } from 'zustand/vanilla';
import type { GridSize } from '../types';
import { resolveConfig, type EditorConfig, type EditorConfigOverrides } from '../config/defaults';
import type { RandomSource } from '../utils/controlIds';
import type { EditorStoreState, StoreContext } from './types';
import {
  createClipboardSlice,
  createControlSlice,
  createInteractionSlice,
  createSelectionSlice,
  createSessionSlice,
} from './slices';

export type EditorStore = StoreApi<EditorStoreState>;

export interface EditorStoreOptions {
  grid?: GridSize;
  config?: EditorConfig | EditorConfigOverrides;
  now?: () => number;
  random?: RandomSource;
}

// Placeholder until a device reports its real size
const DEFAULT_GRID: GridSize = { width: 16, height: 8 };

/**
 * Create one editor store. Each device session owns exactly one; every
 * action on it runs to completion synchronously, so a render pass reading
 * getState() never sees a half-applied edit.
 */
export function createEditorStore(options: EditorStoreOptions = {}): EditorStore {
  const context: StoreContext = {
    config: resolveConfig(options.config),
    now: options.now ?? Date.now,
    random: options.random ?? Math.random,
  };

  return createStore<EditorStoreState>()((...a) => ({
    ...createSessionSlice(options.grid ?? DEFAULT_GRID)(...a),
    ...createControlSlice(context)(...a),
    ...createSelectionSlice(...a),
    ...createClipboardSlice(...a),
    ...createInteractionSlice(context)(...a),
  }));
}
