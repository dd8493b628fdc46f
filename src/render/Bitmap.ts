/**
 * Opaque image primitive supplied by the host renderer.
 *
 * The compositor never touches pixels itself: scaling, blending and colour-key
 * processing happen behind these calls. Coordinates are integer pixels.
 */

import type { Rect } from "../types";

export interface Bitmap {
  readonly width: number;
  readonly height: number;

  /** A view onto `rect` of this bitmap, clipped to its bounds. */
  subImage(rect: Rect): Bitmap;

  /** Draw `src` with its top-left corner at (dx, dy), alpha-scaled (default 1). */
  drawImage(src: Bitmap, dx: number, dy: number, alpha?: number): void;

  /** Reset every pixel to transparent. */
  clear(): void;
}

export interface BitmapFactory {
  create(width: number, height: number): Bitmap;
}

/** The bitmap's own bounds, anchored at the origin. */
export function bitmapBounds(bitmap: Bitmap): Rect {
  return { minX: 0, minY: 0, maxX: bitmap.width, maxY: bitmap.height };
}
