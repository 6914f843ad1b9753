// Integer cell coordinate on the grid, origin top-left
export interface GridPoint {
  x: number;
  y: number;
}

// Grid dimensions, fixed for the lifetime of a device session
export interface GridSize {
  width: number;
  height: number;
}

// =============================================================================
// Shapes
// =============================================================================

export type ShapeKind = 'point' | 'rectangle' | 'triangle';

export interface PointShape {
  kind: 'point';
  points: GridPoint[];
}

// Two corners, order-independent
export interface RectangleShape {
  kind: 'rectangle';
  points: GridPoint[];
}

export interface TriangleShape {
  kind: 'triangle';
  points: GridPoint[];
}

export type Shape = PointShape | RectangleShape | TriangleShape;

// Number of points each kind is built from
export const SHAPE_POINT_COUNT: Record<ShapeKind, number> = {
  point: 1,
  rectangle: 2,
  triangle: 3,
};

// Inclusive bounding box
export interface CellBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Segment {
  a: GridPoint;
  b: GridPoint;
}

// =============================================================================
// Controls
// =============================================================================

export type ControlVariant = 'trigger' | 'toggle' | 'slider';

export const CONTROL_VARIANTS: ControlVariant[] = ['trigger', 'toggle', 'slider'];

export interface Control {
  id: string;
  shape: Shape;
  variant: ControlVariant;
  // 0 | 1 for trigger and toggle, [0, 1] fill fraction for slider
  state: number;
  // ms timestamp of the last touch, 0 = never touched
  lastTouch: number;
  baseBrightness: number;
  peakBrightness: number;
}

// Brightness level range accepted by the device
export const MIN_LEVEL = 0;
export const MAX_LEVEL = 15;

// Independent clamps for the two brightness parameters
export const BASE_BRIGHTNESS_RANGE = { min: 0, max: 13 } as const;
export const PEAK_BRIGHTNESS_RANGE = { min: 2, max: 15 } as const;

// 'static': base when off, peak when on
// 'flash': steps down from peak to base after each touch
export type BrightnessPolicy = 'static' | 'flash';

// =============================================================================
// Edit Results
// =============================================================================

export type RejectionReason =
  | 'overlap'
  | 'reserved-row'
  | 'out-of-bounds'
  | 'point-count'
  | 'degenerate'
  | 'empty-clipboard';

export interface EditRejection {
  reason: RejectionReason;
  message: string;
}

export type EditResult =
  | { ok: true; control: Control }
  | { ok: false; rejection: EditRejection };

// =============================================================================
// Interaction
// =============================================================================

export type InteractionMode = 'normal' | 'meta';

export interface GridKeyEvent {
  x: number;
  y: number;
  pressed: boolean;
}

// What a meta-mode key-down landed on
export type MetaPressTarget = 'increment' | 'decrement' | 'copy-delete' | 'control' | 'empty';

export interface MetaPress {
  x: number;
  y: number;
  at: number;
  target: MetaPressTarget;
}

export interface TimedPress {
  x: number;
  y: number;
  at: number;
}

// Control state before the first point of a gesture touched it
export interface PressTouch {
  id: string;
  state: number;
  lastTouch: number;
}

// Affordance cells drawn beside the selected control in meta mode
export interface MetaUiCells {
  increment: GridPoint;
  decrement: GridPoint;
  copyDelete: GridPoint;
}
