// Re-export all slices
export { createSessionSlice, type SessionSlice } from './sessionSlice';
export { createControlSlice, type ControlSlice } from './controlSlice';
export { createSelectionSlice, type SelectionSlice } from './selectionSlice';
export { createClipboardSlice, type ClipboardSlice } from './clipboardSlice';
export { createInteractionSlice, type InteractionSlice } from './interactionSlice';
