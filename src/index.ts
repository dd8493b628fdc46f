export type {
  Point,
  Rect,
  Color,
  CastRecord,
  TextRecord,
  PictureData,
  PictureSource,
  LayerKind,
  CappedLayerKind,
} from "./types";
export { colorsEqual } from "./types";

export { CompositorError, NotFoundError, ResourceExhaustedError } from "./errors";
export type { NotFoundSubject } from "./errors";

export {
  EMPTY_RECT,
  rect,
  isEmptyRect,
  rectWidth,
  rectHeight,
  rectsEqual,
  unionRect,
  intersectRect,
  containsRect,
  translateRect,
} from "./geometry/Rect";

export type { Bitmap, BitmapFactory } from "./render/Bitmap";
export { bitmapBounds } from "./render/Bitmap";

export { ZPath, compareZPaths } from "./scene/ZPath";
export { ZOrderCounter, ROOT_SCOPE } from "./scene/ZOrderCounter";
export { SceneNode } from "./scene/SceneNode";
export type { CustomDrawFn } from "./scene/SceneNode";
export { SceneGraph } from "./scene/SceneGraph";
export type { DebugDrawCallback, SceneGraphState, SceneNodeState } from "./scene/SceneGraph";

export { BaseLayer } from "./layers/BaseLayer";
export type { BaseLayerInit } from "./layers/BaseLayer";
export { BackgroundLayer, Z_ORDER_BACKGROUND } from "./layers/BackgroundLayer";
export { DrawingLayer } from "./layers/DrawingLayer";
export { DrawingEntry } from "./layers/DrawingEntry";
export type { DrawingEntryInit } from "./layers/DrawingEntry";
export { CastLayer, subImageCastBuilder } from "./layers/CastLayer";
export type { CastImageBuilder, CastLayerInit } from "./layers/CastLayer";
export { TextLayer } from "./layers/TextLayer";
export type { Layer } from "./layers/Layer";
export { sortLayersByZOrder } from "./layers/Layer";

export { DirtyTracker } from "./compositor/DirtyTracker";
export { shouldSkipLayer, isLayerVisible, getVisibleRegion } from "./compositor/Occlusion";
export { OccluderIndex } from "./compositor/OccluderIndex";
export { PictureLayerSet } from "./compositor/PictureLayerSet";
export { WindowLayerSet } from "./compositor/WindowLayerSet";
export { LayerManager } from "./compositor/LayerManager";

export type { CompositorSettings } from "./settings/CompositorSettings";
export { DEFAULT_COMPOSITOR_SETTINGS, mergeSettings, layerLimit } from "./settings/CompositorSettings";
