import type { Rect } from "../types";

/** The canonical empty rectangle. Empty results are always normalised to it. */
export const EMPTY_RECT: Readonly<Rect> = Object.freeze({ minX: 0, minY: 0, maxX: 0, maxY: 0 });

/** Rectangle from origin and size. Non-positive sizes produce EMPTY_RECT. */
export function rect(x: number, y: number, width: number, height: number): Rect {
  if (width <= 0 || height <= 0) return { ...EMPTY_RECT };
  return { minX: x, minY: y, maxX: x + width, maxY: y + height };
}

export function isEmptyRect(r: Rect): boolean {
  return r.minX >= r.maxX || r.minY >= r.maxY;
}

export function rectWidth(r: Rect): number {
  return r.maxX - r.minX;
}

export function rectHeight(r: Rect): number {
  return r.maxY - r.minY;
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  if (isEmptyRect(a) && isEmptyRect(b)) return true;
  return a.minX === b.minX && a.minY === b.minY && a.maxX === b.maxX && a.maxY === b.maxY;
}

/**
 * Smallest rectangle containing both inputs.
 * An empty operand contributes nothing.
 */
export function unionRect(a: Rect, b: Rect): Rect {
  if (isEmptyRect(a)) return isEmptyRect(b) ? { ...EMPTY_RECT } : { ...b };
  if (isEmptyRect(b)) return { ...a };
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function intersectRect(a: Rect, b: Rect): Rect {
  const r: Rect = {
    minX: Math.max(a.minX, b.minX),
    minY: Math.max(a.minY, b.minY),
    maxX: Math.min(a.maxX, b.maxX),
    maxY: Math.min(a.maxY, b.maxY),
  };
  return isEmptyRect(r) ? { ...EMPTY_RECT } : r;
}

/** True if `outer` covers every point of `inner`. */
export function containsRect(outer: Rect, inner: Rect): boolean {
  return (
    outer.minX <= inner.minX &&
    outer.minY <= inner.minY &&
    outer.maxX >= inner.maxX &&
    outer.maxY >= inner.maxY
  );
}

export function translateRect(r: Rect, dx: number, dy: number): Rect {
  return { minX: r.minX + dx, minY: r.minY + dy, maxX: r.maxX + dx, maxY: r.maxY + dy };
}
