/**
 * Editor State Machine
 *
 * Pure decision functions with no store dependencies. They turn a key event
 * plus a read-only view of the editor into an intent; the interaction slice
 * applies the intent against the store.
 *
 * This is the core logic that can be unit tested without a device.
 */

import type { Control, GridPoint, GridSize, MetaPress, MetaPressTarget, TimedPress } from '../types';
import { getMetaUiCells, sameCell } from './metaUi';

// =============================================================================
// Intents
// =============================================================================

export type MetaIntent =
  | { type: 'adjust-brightness'; controlId: string; delta: number }
  | { type: 'copy'; controlId: string }
  | { type: 'delete'; controlId: string }
  | { type: 'select'; controlId: string }
  | { type: 'cycle-variant'; controlId: string }
  | { type: 'paste' }
  | { type: 'create-point' };

export type ReleaseIntent =
  | { type: 'create-rectangle'; points: GridPoint[] }
  | { type: 'create-triangle'; points: GridPoint[] }
  | { type: 'touch' };

/**
 * Read-only view of the editor a meta-mode press is decided against
 */
export interface MetaPressContext {
  grid: GridSize;
  selected: Control | null;
  controlAtPress: Control | null;
  clipboardFull: boolean;
  previousPress: MetaPress | undefined;
  lastCopyDeletePress: TimedPress | null;
  doublePressWindowMs: number;
}

export interface MetaDecision {
  intent: MetaIntent;
  target: MetaPressTarget;
}

// =============================================================================
// Meta Mode
// =============================================================================

/**
 * Decide what a meta-mode key-down at (x, y) does.
 *
 * With a selection, the affordance cells win, in order: increment,
 * decrement, copy/delete. Otherwise the press selects the control under it,
 * pastes (clipboard full and the previous press hit copy/delete) or creates
 * a single-point trigger.
 */
export function resolveMetaPress(x: number, y: number, at: number, context: MetaPressContext): MetaDecision {
  const press = { x, y };
  const { selected } = context;
  const cells = selected ? getMetaUiCells(selected.shape, context.grid) : null;

  if (selected && cells) {
    if (sameCell(press, cells.increment)) {
      return { intent: { type: 'adjust-brightness', controlId: selected.id, delta: 1 }, target: 'increment' };
    }
    if (sameCell(press, cells.decrement)) {
      return { intent: { type: 'adjust-brightness', controlId: selected.id, delta: -1 }, target: 'decrement' };
    }
    if (sameCell(press, cells.copyDelete)) {
      const intent: MetaIntent = isDoublePress(press, at, context.lastCopyDeletePress, context.doublePressWindowMs)
        ? { type: 'delete', controlId: selected.id }
        : { type: 'copy', controlId: selected.id };
      return { intent, target: 'copy-delete' };
    }
  }

  if (context.controlAtPress) {
    const controlId = context.controlAtPress.id;
    const intent: MetaIntent = controlId === selected?.id
      ? { type: 'cycle-variant', controlId }
      : { type: 'select', controlId };
    return { intent, target: 'control' };
  }

  if (context.clipboardFull && context.previousPress?.target === 'copy-delete') {
    return { intent: { type: 'paste' }, target: 'empty' };
  }

  return { intent: { type: 'create-point' }, target: 'empty' };
}

/**
 * Second press on the same cell within the window, measured from that
 * cell's previous activation
 */
export function isDoublePress(
  press: GridPoint,
  at: number,
  previous: TimedPress | null,
  windowMs: number
): boolean {
  if (!previous || !sameCell(press, previous)) {
    return false;
  }
  const elapsed = at - previous.at;
  return elapsed >= 0 && elapsed < windowMs;
}

/**
 * Append to a fixed-size history, dropping the oldest entries
 */
export function pushHistory<T>(history: T[], entry: T, size: number): T[] {
  const next = [...history, entry];
  return next.length > size ? next.slice(next.length - size) : next;
}

// =============================================================================
// Normal Mode
// =============================================================================

/**
 * Decide what a normal-mode key-up does with the pending points:
 * two make a rectangle, three a triangle, anything else is a tap.
 */
export function resolveRelease(pendingPoints: GridPoint[]): ReleaseIntent {
  switch (pendingPoints.length) {
    case 2:
      return { type: 'create-rectangle', points: pendingPoints };
    case 3:
      return { type: 'create-triangle', points: pendingPoints };
    default:
      return { type: 'touch' };
  }
}
