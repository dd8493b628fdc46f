/**
 * Core type definitions shared across the scene graph and the compositor.
 */

import type { Bitmap } from "./render/Bitmap";

// --- Geometry ---

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned, half-open rectangle. Same shape as an rbush bbox. */
export interface Rect {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// --- Color ---

/** 8-bit RGBA colour, used for cast colour keys and window backgrounds. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export function colorsEqual(a: Color | undefined, b: Color | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

// --- Collaborator records ---

/** Cast state as held by the cast data manager. */
export interface CastRecord {
  x: number;
  y: number;
  srcX: number;
  srcY: number;
  width: number;
  height: number;
  visible: boolean;
  transColor?: Color;
}

/** Text placement as held by the text data manager. */
export interface TextRecord {
  x: number;
  y: number;
  text: string;
  visible?: boolean;
}

/** A loaded picture as handed out by the picture manager. */
export interface PictureData {
  image: Bitmap;
  width: number;
  height: number;
}

/** Picture manager lookup. Throws NotFoundError for unknown ids. */
export interface PictureSource {
  getPic(picId: number): PictureData;
}

// --- Layers ---

export type LayerKind = "background" | "drawing" | "drawing-entry" | "cast" | "text";

/** Layer kinds that count against a per-kind capacity. */
export type CappedLayerKind = "cast" | "text";
