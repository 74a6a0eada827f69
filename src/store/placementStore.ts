import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Offset, PlacementState, Point } from '@/types/stamp';
import { ConfigError, StateLockedError } from '@/lib/errors';

interface PlacementActions {
  currentPosition: () => Point;
  beginDrag: () => void;
  updateDrag: (dx: number, dy: number) => void;
  commitDrag: () => void;
  setScale: (scale: number) => void;
  setPosition: (x: number, y: number) => void;
  snapshot: () => PlacementState;
  lock: () => void;
  unlock: () => void;
}

export type PlacementStore = PlacementState & PlacementActions;
export type PlacementStoreApi = StoreApi<PlacementStore>;

export interface PlacementInit {
  positionMM?: Point;
  scale?: number;
}

const ZERO_OFFSET: Offset = { dx: 0, dy: 0 };

/** Position including any uncommitted drag offset. */
export function foldPosition(state: PlacementState): Point {
  return {
    x: state.positionMM.x + state.dragOffsetMM.dx,
    y: state.positionMM.y + state.dragOffsetMM.dy,
  };
}

export function validateScale(scale: number): void {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new ConfigError(`Scale must be greater than zero, got ${scale}`);
  }
}

function assertUnlocked(state: PlacementState, action: string): void {
  if (state.locked) {
    throw new StateLockedError(`Cannot ${action} while the page is being written`);
  }
}

/**
 * Placement of the stamp on the page, independent of any drawing surface.
 *
 * Every `set` replaces the state object, so a `getState()` result is a snapshot that later
 * mutations never change underneath a reader.
 */
export const createPlacementStore = (init: PlacementInit = {}): PlacementStoreApi => {
  const scale = init.scale ?? 1;
  validateScale(scale);
  const positionMM = init.positionMM ?? { x: 0, y: 0 };
  if (!Number.isFinite(positionMM.x) || !Number.isFinite(positionMM.y)) {
    throw new ConfigError(`Position must be finite, got (${positionMM.x}, ${positionMM.y})`);
  }

  return createStore<PlacementStore>()((set, get) => ({
    positionMM: { ...positionMM },
    scale,
    dragOffsetMM: ZERO_OFFSET,
    dragging: false,
    locked: false,

    currentPosition: () => foldPosition(get()),

    beginDrag: () => {
      const state = get();
      assertUnlocked(state, 'start a drag');
      if (state.dragging) return;
      set({ dragging: true, dragOffsetMM: ZERO_OFFSET });
    },

    // An update outside a gesture opens one, so a non-zero offset always means "dragging"
    updateDrag: (dx, dy) => {
      assertUnlocked(get(), 'move the stamp');
      set({ dragging: true, dragOffsetMM: { dx, dy } });
    },

    commitDrag: () => {
      const state = get();
      assertUnlocked(state, 'commit a drag');
      if (!state.dragging) return;
      set({
        positionMM: foldPosition(state),
        dragOffsetMM: ZERO_OFFSET,
        dragging: false,
      });
    },

    setScale: (next) => {
      assertUnlocked(get(), 'change the scale');
      validateScale(next);
      set({ scale: next });
    },

    setPosition: (x, y) => {
      assertUnlocked(get(), 'move the stamp');
      if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new ConfigError(`Position must be finite, got (${x}, ${y})`);
      }
      set({ positionMM: { x, y } });
    },

    snapshot: () => {
      const { positionMM, scale, dragOffsetMM, dragging, locked } = get();
      return { positionMM, scale, dragOffsetMM, dragging, locked };
    },

    lock: () => set({ locked: true }),

    unlock: () => set({ locked: false }),
  }));
};
