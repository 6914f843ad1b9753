/**
 * Centralized editor configuration.
 * All timing windows and brightness levels used by the editor and the
 * render loop are defined here.
 */

import {
  BASE_BRIGHTNESS_RANGE,
  MAX_LEVEL,
  MIN_LEVEL,
  PEAK_BRIGHTNESS_RANGE,
  type BrightnessPolicy,
} from '../types';

export interface AffordanceLevels {
  increment: number;
  decrement: number;
  copyDelete: number;
}

export interface EditorConfig {
  // ===== Render Loop =====
  frameIntervalMs: number;       // Period between frames (33 ≈ 30 Hz, 100 = 10 Hz)

  // ===== Interaction =====
  doublePressWindowMs: number;   // Second copy/delete press inside this window deletes
  metaHistorySize: number;       // Meta-mode key-downs remembered
  idLength: number;              // Characters in a control ID

  // ===== Control Brightness =====
  baseBrightness: number;        // Resting level of new controls
  peakBrightness: number;        // Active level of new controls
  brightnessPolicy: BrightnessPolicy;
  flashDurationMs: number;       // 'flash' policy: time to fall back to base
  flashSteps: number;            // 'flash' policy: discrete levels in the fall

  // ===== Overlay Levels =====
  pendingPointLevel: number;     // Cells of an in-progress gesture
  metaKeyActiveLevel: number;    // Meta key while held
  metaKeyIdleLevel: number;      // Meta key otherwise
  affordanceLevels: AffordanceLevels;
}

export const defaultEditorConfig: EditorConfig = {
  frameIntervalMs: 33,
  doublePressWindowMs: 500,
  metaHistorySize: 5,
  idLength: 6,
  baseBrightness: 3,
  peakBrightness: 15,
  brightnessPolicy: 'static',
  flashDurationMs: 400,
  flashSteps: 4,
  pendingPointLevel: 15,
  metaKeyActiveLevel: 15,
  metaKeyIdleLevel: 4,
  affordanceLevels: {
    increment: 12,
    decrement: 6,
    copyDelete: 9,
  },
};

export type EditorConfigOverrides = Partial<Omit<EditorConfig, 'affordanceLevels'>> & {
  affordanceLevels?: Partial<AffordanceLevels>;
};

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Invalid config "${key}": ${message}`);
    this.name = 'ConfigError';
  }
}

function requireInteger(key: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(key, `expected an integer in [${min}, ${max}], got ${value}`);
  }
}

function requireLevel(key: string, value: number): void {
  requireInteger(key, value, MIN_LEVEL, MAX_LEVEL);
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigError on the first invalid value.
 */
export function resolveConfig(overrides: EditorConfigOverrides = {}): EditorConfig {
  const config: EditorConfig = {
    ...defaultEditorConfig,
    ...overrides,
    affordanceLevels: {
      ...defaultEditorConfig.affordanceLevels,
      ...overrides.affordanceLevels,
    },
  };

  requireInteger('frameIntervalMs', config.frameIntervalMs, 1);
  requireInteger('doublePressWindowMs', config.doublePressWindowMs, 0);
  requireInteger('metaHistorySize', config.metaHistorySize, 2);
  requireInteger('idLength', config.idLength, 1, 32);
  requireInteger('baseBrightness', config.baseBrightness, BASE_BRIGHTNESS_RANGE.min, BASE_BRIGHTNESS_RANGE.max);
  requireInteger('peakBrightness', config.peakBrightness, PEAK_BRIGHTNESS_RANGE.min, PEAK_BRIGHTNESS_RANGE.max);
  requireInteger('flashDurationMs', config.flashDurationMs, 1);
  requireInteger('flashSteps', config.flashSteps, 1);
  requireLevel('pendingPointLevel', config.pendingPointLevel);
  requireLevel('metaKeyActiveLevel', config.metaKeyActiveLevel);
  requireLevel('metaKeyIdleLevel', config.metaKeyIdleLevel);
  requireLevel('affordanceLevels.increment', config.affordanceLevels.increment);
  requireLevel('affordanceLevels.decrement', config.affordanceLevels.decrement);
  requireLevel('affordanceLevels.copyDelete', config.affordanceLevels.copyDelete);

  if (config.brightnessPolicy !== 'static' && config.brightnessPolicy !== 'flash') {
    throw new ConfigError('brightnessPolicy', `expected "static" or "flash", got ${String(config.brightnessPolicy)}`);
  }

  return config;
}

function parseIntVar(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read overrides from environment variables:
 *   GRID_FRAME_INTERVAL_MS, GRID_DOUBLE_PRESS_MS, GRID_BRIGHTNESS_POLICY
 */
export function configFromEnv(env: Record<string, string | undefined>): EditorConfig {
  const overrides: EditorConfigOverrides = {};

  const interval = env.GRID_FRAME_INTERVAL_MS;
  if (interval !== undefined && interval !== '') {
    overrides.frameIntervalMs = parseIntVar('GRID_FRAME_INTERVAL_MS', interval);
  }

  const window = env.GRID_DOUBLE_PRESS_MS;
  if (window !== undefined && window !== '') {
    overrides.doublePressWindowMs = parseIntVar('GRID_DOUBLE_PRESS_MS', window);
  }

  const policy = env.GRID_BRIGHTNESS_POLICY;
  if (policy === 'static' || policy === 'flash') {
    overrides.brightnessPolicy = policy;
  } else if (policy !== undefined && policy !== '') {
    throw new ConfigError('GRID_BRIGHTNESS_POLICY', `expected "static" or "flash", got "${policy}"`);
  }

  return resolveConfig(overrides);
}

/**
 * Debug tags named in GRID_DEBUG_TAGS (comma separated)
 */
export function debugTagsFromEnv(env: Record<string, string | undefined>): string[] {
  return (env.GRID_DEBUG_TAGS ?? '')
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}
