/**
 * Grid controls editor
 *
 * Geometry, control model, editor store, interaction state machine and
 * render loop for placing controls on an illuminated button grid.
 */

// Types
export * from './types';

// Configuration
export {
  defaultEditorConfig,
  resolveConfig,
  configFromEnv,
  debugTagsFromEnv,
  ConfigError,
} from './config/defaults';
export type { EditorConfig, EditorConfigOverrides, AffordanceLevels } from './config/defaults';

// Geometry
export {
  containsPoint,
  drawShape,
  shapeEdges,
  segmentsIntersect,
  shapesOverlap,
  shapeFromPoints,
  translateShape,
  shapeBounds,
  shapeCells,
} from './utils/shapes';
export type { LevelTarget } from './utils/shapes';
export { generateUniqueId, isControlId } from './utils/controlIds';

// Control model
export {
  createControl,
  touchControl,
  adjustBrightness,
  getBrightness,
  drawControl,
} from './engine/controls';
export { validatePlacement } from './engine/placement';

// Editor
export { resolveMetaPress, resolveRelease, isDoublePress } from './editor/EditorStateMachine';
export { getMetaUiPosition, getMetaUiCells, getMetaKey } from './editor/metaUi';
export { createEditorStore } from './store/editorStore';
export type { EditorStore, EditorStoreOptions } from './store/editorStore';
export type { EditorStoreState } from './store/types';

// Rendering and devices
export { FrameBuffer } from './render/FrameBuffer';
export { composeFrame } from './render/composeFrame';
export { RenderLoop } from './render/RenderLoop';
export type { GridDevice, Unsubscribe } from './device/types';
export { VirtualGrid } from './device/VirtualGrid';
export { renderFrameAscii, renderFrameHex } from './device/ascii';
export { GridSession } from './engine/GridSession';

// Debug
export { debug, enableDebugTag, disableDebugTag, setDebugTags, setDebugSink } from './utils/debug';
