/**
 * Control Model
 *
 * A control is a shape plus a variant that decides how a touch changes its
 * logical state, and two brightness parameters the renderer picks between.
 * All functions here are pure: they return a new control and never mutate.
 */

import {
  BASE_BRIGHTNESS_RANGE,
  CONTROL_VARIANTS,
  PEAK_BRIGHTNESS_RANGE,
  type BrightnessPolicy,
  type Control,
  type ControlVariant,
  type Shape,
} from '../types';
import { cloneShape, shapeBounds, shapeCells, type LevelTarget } from '../utils/shapes';
import { debug } from '../utils/debug';

export interface CreateControlOptions {
  variant?: ControlVariant;
  baseBrightness?: number;
  peakBrightness?: number;
}

export interface BrightnessOptions {
  policy: BrightnessPolicy;
  flashDurationMs: number;
  flashSteps: number;
}

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const clampBaseBrightness = (value: number): number =>
  clamp(Math.round(value), BASE_BRIGHTNESS_RANGE.min, BASE_BRIGHTNESS_RANGE.max);

export const clampPeakBrightness = (value: number): number =>
  clamp(Math.round(value), PEAK_BRIGHTNESS_RANGE.min, PEAK_BRIGHTNESS_RANGE.max);

export function createControl(id: string, shape: Shape, options: CreateControlOptions = {}): Control {
  return {
    id,
    shape: cloneShape(shape),
    variant: options.variant ?? 'trigger',
    state: 0,
    lastTouch: 0,
    baseBrightness: clampBaseBrightness(options.baseBrightness ?? 3),
    peakBrightness: clampPeakBrightness(options.peakBrightness ?? 15),
  };
}

/**
 * Deep copy under a new ID. Logical state starts over.
 */
export function cloneControl(control: Control, id: string): Control {
  return {
    ...control,
    id,
    shape: cloneShape(control.shape),
    state: 0,
    lastTouch: 0,
  };
}

// Fill fraction of a slider touched at column x
function sliderValueAt(control: Control, x: number): number {
  const bounds = shapeBounds(control.shape);
  if (!bounds || bounds.maxX === bounds.minX) {
    return 1;
  }
  return clamp((x - bounds.minX) / (bounds.maxX - bounds.minX), 0, 1);
}

/**
 * Apply a press (pressed = true) or release to a control.
 *
 * - trigger: flips 0 <-> 1 on press, release does nothing
 * - toggle: follows the key, 1 while held and 0 once released
 * - slider: on press takes the touched column as its fill fraction
 */
export function touchControl(control: Control, pressed: boolean, at: number, x?: number): Control {
  debug('touch', `${control.id} ${pressed ? 'pressed' : 'released'}`);

  let state = control.state;
  switch (control.variant) {
    case 'trigger':
      if (pressed) {
        state = control.state === 0 ? 1 : 0;
      }
      break;
    case 'toggle':
      state = pressed ? 1 : 0;
      break;
    case 'slider':
      if (pressed) {
        state = x === undefined ? 1 : sliderValueAt(control, x);
      }
      break;
  }

  return { ...control, state, lastTouch: at };
}

/**
 * Shift both brightness parameters by delta. Base and peak are clamped to
 * their own ranges.
 */
export function adjustBrightness(control: Control, delta: number): Control {
  return {
    ...control,
    baseBrightness: clampBaseBrightness(control.baseBrightness + delta),
    peakBrightness: clampPeakBrightness(control.peakBrightness + delta),
  };
}

export function setControlVariant(control: Control, variant: ControlVariant): Control {
  if (control.variant === variant) {
    return control;
  }
  return { ...control, variant, state: 0 };
}

export function nextVariant(variant: ControlVariant): ControlVariant {
  const index = CONTROL_VARIANTS.indexOf(variant);
  return CONTROL_VARIANTS[(index + 1) % CONTROL_VARIANTS.length];
}

/**
 * Level a control shows at time `now`.
 *
 * static: base when off, peak otherwise.
 * flash: after a touch that left the control on, falls from peak to base in
 * `flashSteps` even steps over `flashDurationMs`. Once the window has passed
 * a toggle stays at peak and the other variants rest at base.
 */
export function getBrightness(control: Control, options: BrightnessOptions, now: number): number {
  const { baseBrightness: base, peakBrightness: peak } = control;
  if (control.state === 0) {
    return base;
  }
  if (options.policy === 'static') {
    return peak;
  }

  const elapsed = now - control.lastTouch;
  if (elapsed >= 0 && elapsed < options.flashDurationMs) {
    if (options.flashSteps <= 1 || peak <= base) {
      return peak;
    }
    const stepMs = options.flashDurationMs / options.flashSteps;
    const step = Math.floor(elapsed / stepMs);
    const level = peak - Math.round(((peak - base) * step) / (options.flashSteps - 1));
    return clamp(level, base, peak);
  }
  return control.variant === 'toggle' ? peak : base;
}

/**
 * Last column of a slider drawn at its active level, or null when nothing
 * is filled
 */
export function sliderFillColumn(control: Control): number | null {
  const bounds = shapeBounds(control.shape);
  if (!bounds || control.state <= 0) {
    return null;
  }
  return bounds.minX + Math.round(control.state * (bounds.maxX - bounds.minX));
}

export function drawControl(control: Control, target: LevelTarget, options: BrightnessOptions, now: number): void {
  const level = getBrightness(control, options, now);

  if (control.variant !== 'slider') {
    for (const cell of shapeCells(control.shape)) {
      target.setLevel(cell.x, cell.y, level);
    }
    return;
  }

  // Each row lights a horizontal run up to the fill column
  const fill = sliderFillColumn(control);
  for (const cell of shapeCells(control.shape)) {
    const lit = fill !== null && cell.x <= fill;
    target.setLevel(cell.x, cell.y, lit ? level : control.baseBrightness);
  }
}
