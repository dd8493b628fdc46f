import type { BackgroundLayer } from "./BackgroundLayer";
import type { CastLayer } from "./CastLayer";
import type { DrawingEntry } from "./DrawingEntry";
import type { DrawingLayer } from "./DrawingLayer";
import type { TextLayer } from "./TextLayer";

/** Every drawable a layer set can hold, discriminated by `kind`. */
export type Layer = BackgroundLayer | DrawingLayer | DrawingEntry | CastLayer | TextLayer;

export function sortLayersByZOrder<T extends Layer>(layers: T[]): T[] {
  return layers.sort((a, b) => a.zOrder - b.zOrder);
}
