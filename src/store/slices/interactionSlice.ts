import type { StateCreator } from 'zustand';
import type {
  EditResult,
  GridKeyEvent,
  GridPoint,
  InteractionMode,
  MetaPress,
  PressTouch,
  TimedPress,
} from '../../types';
import type { EditorStoreState, StoreContext } from '../types';
import { pushHistory, resolveMetaPress, resolveRelease, type MetaIntent } from '../../editor/EditorStateMachine';
import { isMetaKey, isReservedRow } from '../../editor/metaUi';
import { createPointShape, createRectangleShape, createTriangleShape } from '../../utils/shapes';
import { debug } from '../../utils/debug';

// =============================================================================
// Interaction Slice - Normal / meta key handling
// =============================================================================

export interface InteractionSlice {
  // State
  mode: InteractionMode;
  pendingPoints: GridPoint[];
  metaHistory: MetaPress[];
  lastCopyDeletePress: TimedPress | null;
  pressTouch: PressTouch | null;

  // Actions
  handleKey: (event: GridKeyEvent) => void;
  pressKey: (x: number, y: number) => void;
  releaseKey: (x: number, y: number) => void;
  enterMetaMode: () => void;
  exitMetaMode: () => void;
  commitPendingGesture: () => EditResult | null;
}

export const createInteractionSlice =
  (context: StoreContext): StateCreator<EditorStoreState, [], [], InteractionSlice> =>
  (set, get) => {
    const applyMetaIntent = (intent: MetaIntent, x: number, y: number, at: number): void => {
      const store = get();
      switch (intent.type) {
        case 'adjust-brightness':
          store.adjustControlBrightness(intent.controlId, intent.delta);
          break;
        case 'copy':
          store.copyControl(intent.controlId);
          set({ lastCopyDeletePress: { x, y, at } });
          break;
        case 'delete':
          store.removeControl(intent.controlId);
          set({ lastCopyDeletePress: null });
          break;
        case 'select':
          store.selectControl(intent.controlId);
          break;
        case 'cycle-variant':
          store.cycleControlVariant(intent.controlId);
          break;
        case 'paste':
          store.pasteAt(x, y);
          break;
        case 'create-point': {
          const result = store.addControl(createPointShape({ x, y }));
          if (result.ok) {
            store.selectControl(result.control.id);
          }
          break;
        }
      }
    };

    const metaPress = (x: number, y: number): void => {
      const store = get();
      const at = context.now();
      const { intent, target } = resolveMetaPress(x, y, at, {
        grid: store.grid,
        selected: store.getSelectedControl(),
        controlAtPress: store.findControlAt(x, y),
        clipboardFull: store.clipboard !== null,
        previousPress: store.metaHistory[store.metaHistory.length - 1],
        lastCopyDeletePress: store.lastCopyDeletePress,
        doublePressWindowMs: context.config.doublePressWindowMs,
      });

      applyMetaIntent(intent, x, y, at);
      set((state) => ({
        metaHistory: pushHistory(state.metaHistory, { x, y, at, target }, context.config.metaHistorySize),
      }));
    };

    return {
      // Initial state
      mode: 'normal',
      pendingPoints: [],
      metaHistory: [],
      lastCopyDeletePress: null,
      pressTouch: null,

      // Actions
      handleKey: ({ x, y, pressed }) => {
        if (pressed) {
          get().pressKey(x, y);
        } else {
          get().releaseKey(x, y);
        }
      },

      pressKey: (x, y) => {
        const { grid, mode } = get();
        if (isMetaKey(x, y, grid)) {
          if (mode === 'normal') {
            get().enterMetaMode();
          }
          return;
        }

        if (mode === 'meta') {
          metaPress(x, y);
          return;
        }

        if (isReservedRow(y, grid)) {
          return;
        }

        const { pendingPoints, pressTouch } = get();
        set({ pendingPoints: [...pendingPoints, { x, y }] });

        if (pendingPoints.length === 0) {
          const target = get().findControlAt(x, y);
          if (target) {
            set({ pressTouch: { id: target.id, state: target.state, lastTouch: target.lastTouch } });
            get().touchControl(target.id, true, x);
          }
          return;
        }

        // A second point makes this a creation gesture: undo the first press
        if (pressTouch) {
          get().restoreTouchState(pressTouch.id, pressTouch.state, pressTouch.lastTouch);
          set({ pressTouch: null });
        }
      },

      releaseKey: (x, y) => {
        const { grid, mode } = get();
        if (isMetaKey(x, y, grid)) {
          if (mode === 'meta') {
            get().exitMetaMode();
          }
          return;
        }

        if (mode === 'meta') {
          return;
        }

        // Bottom-row key-ups still end the gesture
        const intent = resolveRelease(get().pendingPoints);
        if (intent.type !== 'touch') {
          get().commitPendingGesture();
          set({ pressTouch: null });
          return;
        }

        set({ pendingPoints: [], pressTouch: null });
        const released = get().findControlAt(x, y);
        if (released) {
          get().touchControl(released.id, false, x);
        }
      },

      enterMetaMode: () => {
        debug('mode', 'Meta mode on');
        set({ mode: 'meta' });
      },

      exitMetaMode: () => {
        get().commitPendingGesture();
        set({ mode: 'normal', selectedControlId: null, pendingPoints: [], pressTouch: null });
        debug('mode', 'Meta mode off');
      },

      // Turns two or three pending points into a trigger; anything else is left alone
      commitPendingGesture: () => {
        const intent = resolveRelease(get().pendingPoints);
        let result: EditResult | null = null;
        switch (intent.type) {
          case 'create-rectangle': {
            const [a, b] = intent.points;
            result = get().addControl(createRectangleShape(a, b));
            break;
          }
          case 'create-triangle': {
            const [a, b, c] = intent.points;
            result = get().addControl(createTriangleShape(a, b, c));
            break;
          }
          case 'touch':
            break;
        }
        set({ pendingPoints: [] });
        return result;
      },
    };
  };
