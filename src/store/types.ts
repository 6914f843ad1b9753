import type { EditorConfig } from '../config/defaults';
import type { RandomSource } from '../utils/controlIds';
import type { ClipboardSlice } from './slices/clipboardSlice';
import type { ControlSlice } from './slices/controlSlice';
import type { InteractionSlice } from './slices/interactionSlice';
import type { SelectionSlice } from './slices/selectionSlice';
import type { SessionSlice } from './slices/sessionSlice';

/**
 * Things every slice needs that are not state: configuration, the clock
 * used for touch and double-press timing, and the ID random source
 */
export interface StoreContext {
  config: EditorConfig;
  now: () => number;
  random: RandomSource;
}

export type EditorStoreState = SessionSlice &
  ControlSlice &
  SelectionSlice &
  ClipboardSlice &
  InteractionSlice;
