import type { Rect } from "../types";
import { EMPTY_RECT, isEmptyRect, unionRect } from "../geometry/Rect";

/**
 * Union of screen rectangles changed since the last composite, plus a
 * "repaint everything" flag that subsumes it. New sets start fully dirty.
 */
export class DirtyTracker {
  private region: Rect = { ...EMPTY_RECT };
  private full = true;

  get dirtyRegion(): Rect {
    return { ...this.region };
  }

  get fullDirty(): boolean {
    return this.full;
  }

  markFull(): void {
    this.full = true;
  }

  /** Empty rectangles are ignored. */
  addRegion(rect: Rect): void {
    if (isEmptyRect(rect)) return;
    this.region = isEmptyRect(this.region) ? { ...rect } : unionRect(this.region, rect);
  }

  clear(): void {
    this.region = { ...EMPTY_RECT };
    this.full = false;
  }

  isDirty(): boolean {
    return this.full || !isEmptyRect(this.region);
  }
}
