import type { StateCreator } from 'zustand';
import type { Control, ControlVariant, EditRejection, EditResult, Shape } from '../../types';
import type { EditorStoreState, StoreContext } from '../types';
import {
  adjustBrightness,
  createControl,
  nextVariant,
  setControlVariant as withVariant,
  touchControl as withTouch,
} from '../../engine/controls';
import { describeShape, validatePlacement } from '../../engine/placement';
import { generateUniqueId } from '../../utils/controlIds';
import { containsPoint } from '../../utils/shapes';
import { debug } from '../../utils/debug';

// =============================================================================
// Control Slice - Live controls keyed by ID, in insertion (render) order
// =============================================================================

export interface ControlSlice {
  // State
  controls: Map<string, Control>;
  lastRejection: EditRejection | null;

  // Actions
  addControl: (shape: Shape, variant?: ControlVariant) => EditResult;
  placeControl: (control: Control) => EditResult;
  removeControl: (id: string) => boolean;
  touchControl: (id: string, pressed: boolean, x?: number) => Control | null;
  touchControlAt: (x: number, y: number, pressed: boolean) => Control | null;
  restoreTouchState: (id: string, state: number, lastTouch: number) => Control | null;
  adjustControlBrightness: (id: string, delta: number) => Control | null;
  setControlVariant: (id: string, variant: ControlVariant) => Control | null;
  cycleControlVariant: (id: string) => Control | null;
  rejectEdit: (rejection: EditRejection) => EditResult;

  // Queries
  findControlAt: (x: number, y: number) => Control | null;
  canPlaceShape: (shape: Shape, ignoreId?: string) => EditRejection | null;
  newControlId: () => string;
}

export const createControlSlice =
  (context: StoreContext): StateCreator<EditorStoreState, [], [], ControlSlice> =>
  (set, get) => {
    // Replace one control, keeping its position in the map
    const updateControl = (id: string, update: (control: Control) => Control): Control | null => {
      const existing = get().controls.get(id);
      if (!existing) {
        return null;
      }
      const updated = update(existing);
      const controls = new Map(get().controls);
      controls.set(id, updated);
      set({ controls });
      return updated;
    };

    return {
      // Initial state
      controls: new Map(),
      lastRejection: null,

      // Actions
      addControl: (shape, variant = 'trigger') => {
        const control = createControl(get().newControlId(), shape, {
          variant,
          baseBrightness: context.config.baseBrightness,
          peakBrightness: context.config.peakBrightness,
        });
        return get().placeControl(control);
      },

      placeControl: (control) => {
        const { controls, grid } = get();
        if (controls.has(control.id)) {
          return get().rejectEdit({ reason: 'overlap', message: `Control ${control.id} already exists` });
        }

        const rejection = validatePlacement(control.shape, controls.values(), grid);
        if (rejection) {
          return get().rejectEdit(rejection);
        }

        const next = new Map(controls);
        next.set(control.id, control);
        set({ controls: next, lastRejection: null });
        debug('edit', `Created ${control.variant} ${control.id}: ${describeShape(control.shape)}`);
        return { ok: true, control };
      },

      removeControl: (id) => {
        const { controls, selectedControlId } = get();
        if (!controls.has(id)) {
          return false;
        }
        const next = new Map(controls);
        next.delete(id);
        set({
          controls: next,
          // Never leave the selection pointing at a deleted control
          selectedControlId: selectedControlId === id ? null : selectedControlId,
        });
        debug('edit', `Deleted ${id}`);
        return true;
      },

      touchControl: (id, pressed, x) =>
        updateControl(id, (control) => withTouch(control, pressed, context.now(), x)),

      touchControlAt: (x, y, pressed) => {
        const target = get().findControlAt(x, y);
        if (!target) {
          return null;
        }
        return get().touchControl(target.id, pressed, x);
      },

      restoreTouchState: (id, state, lastTouch) =>
        updateControl(id, (control) => ({ ...control, state, lastTouch })),

      adjustControlBrightness: (id, delta) => {
        const updated = updateControl(id, (control) => adjustBrightness(control, delta));
        if (updated) {
          debug('edit', `${id} brightness base=${updated.baseBrightness} peak=${updated.peakBrightness}`);
        }
        return updated;
      },

      setControlVariant: (id, variant) => updateControl(id, (control) => withVariant(control, variant)),

      cycleControlVariant: (id) => {
        const updated = updateControl(id, (control) => withVariant(control, nextVariant(control.variant)));
        if (updated) {
          debug('edit', `${id} is now a ${updated.variant}`);
        }
        return updated;
      },

      rejectEdit: (rejection) => {
        debug('edit', rejection.message);
        set({ lastRejection: rejection });
        return { ok: false, rejection };
      },

      // Queries
      findControlAt: (x, y) => {
        for (const control of get().controls.values()) {
          if (containsPoint(control.shape, x, y)) {
            return control;
          }
        }
        return null;
      },

      canPlaceShape: (shape, ignoreId) => validatePlacement(shape, get().controls.values(), get().grid, ignoreId),

      newControlId: () => generateUniqueId(get().controls.keys(), context.config.idLength, context.random),
    };
  };
