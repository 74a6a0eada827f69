import type { Point } from '@/types/stamp';
import type { PlacementStoreApi } from '@/store/placementStore';
import { assertDensity, pixelsToMM } from './units';

export type DragPhase = 'idle' | 'dragging';

export type RedrawListener = () => void;

export interface DragStateMachineOptions {
  store: PlacementStoreApi;
  /** Density of the preview canvas the pointer coordinates are measured on. */
  previewDensity: number;
  onRedraw?: RedrawListener;
}

/**
 * Turns pointer events on the preview canvas into placement changes.
 *
 * idle --down--> dragging --move--> dragging --up--> idle
 *
 * Every handler returns whether the event was accepted. Events are refused while the
 * store is locked by a splice, and a second pointer-down during a drag is ignored.
 */
export class DragStateMachine {
  private readonly store: PlacementStoreApi;
  private readonly onRedraw: RedrawListener;
  private previewDensity: number;
  private phase: DragPhase = 'idle';
  private anchor: Point = { x: 0, y: 0 };

  constructor(options: DragStateMachineOptions) {
    assertDensity(options.previewDensity, 'preview density');
    this.store = options.store;
    this.previewDensity = options.previewDensity;
    this.onRedraw = options.onRedraw ?? (() => {});
  }

  getPhase(): DragPhase {
    return this.phase;
  }

  getPreviewDensity(): number {
    return this.previewDensity;
  }

  setPreviewDensity(densityPerInch: number): void {
    assertDensity(densityPerInch, 'preview density');
    this.previewDensity = densityPerInch;
  }

  pointerDown(point: Point): boolean {
    if (this.isLocked() || this.phase === 'dragging') return false;
    this.anchor = { x: point.x, y: point.y };
    this.store.getState().beginDrag();
    this.phase = 'dragging';
    return true;
  }

  pointerMove(point: Point): boolean {
    if (this.isLocked() || this.phase !== 'dragging') return false;
    const dx = pixelsToMM(point.x - this.anchor.x, this.previewDensity);
    const dy = pixelsToMM(point.y - this.anchor.y, this.previewDensity);
    this.store.getState().updateDrag(dx, dy);
    this.onRedraw();
    return true;
  }

  pointerUp(): boolean {
    if (this.isLocked() || this.phase !== 'dragging') return false;
    this.store.getState().commitDrag();
    this.phase = 'idle';
    this.onRedraw();
    return true;
  }

  private isLocked(): boolean {
    return this.store.getState().locked;
  }
}
