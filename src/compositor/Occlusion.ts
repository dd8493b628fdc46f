import type { Rect } from "../types";
import type { Layer } from "../layers/Layer";
import { containsRect, intersectRect, isEmptyRect, EMPTY_RECT } from "../geometry/Rect";

/**
 * True when nothing of `lower` can show: it is missing, hidden or empty, or
 * some visible opaque upper layer covers its bounds entirely. Translucent or
 * hidden uppers never hide anything, however much they cover.
 */
export function shouldSkipLayer(
  lower: Layer | null | undefined,
  uppers: readonly (Layer | null | undefined)[],
): boolean {
  if (!lower || !lower.visible) return true;
  const bounds = lower.bounds;
  if (isEmptyRect(bounds)) return true;

  for (const upper of uppers) {
    if (!upper || !upper.opaque || !upper.visible) continue;
    const upperBounds = upper.bounds;
    if (isEmptyRect(upperBounds)) continue;
    if (containsRect(upperBounds, bounds)) return true;
  }
  return false;
}

/** Visible and overlapping `visibleRect`. */
export function isLayerVisible(layer: Layer | null | undefined, visibleRect: Rect): boolean {
  if (!layer || !layer.visible) return false;
  return !isEmptyRect(intersectRect(layer.bounds, visibleRect));
}

/** The part of the layer inside `visibleRect`. */
export function getVisibleRegion(layer: Layer | null | undefined, visibleRect: Rect): Rect {
  if (!layer) return { ...EMPTY_RECT };
  return intersectRect(layer.bounds, visibleRect);
}
