import type { Bitmap, BitmapFactory } from "../render/Bitmap";
import type { Rect } from "../types";
import type { Layer } from "../layers/Layer";
import { sortLayersByZOrder } from "../layers/Layer";
import type { BackgroundLayer } from "../layers/BackgroundLayer";
import type { CastLayer } from "../layers/CastLayer";
import type { DrawingEntry } from "../layers/DrawingEntry";
import type { DrawingLayer } from "../layers/DrawingLayer";
import type { TextLayer } from "../layers/TextLayer";
import { isEmptyRect, rectHeight, rectWidth } from "../geometry/Rect";
import type { CompositorSettings } from "../settings/CompositorSettings";
import { DEFAULT_COMPOSITOR_SETTINGS } from "../settings/CompositorSettings";
import { DirtyTracker } from "./DirtyTracker";
import { OccluderIndex } from "./OccluderIndex";
import { isLayerVisible, shouldSkipLayer } from "./Occlusion";

/**
 * All layers of one picture, stacked in operation order, and the cached
 * composite of them.
 *
 * The background always sits at z 0. Every other layer takes the next value
 * of one counter shared by all kinds, so a cast added after a text paints
 * above it and vice versa.
 */
export class PictureLayerSet {
  readonly picId: number;

  private background: BackgroundLayer | undefined;
  private drawing: DrawingLayer | undefined;
  private casts: CastLayer[] = [];
  private texts: TextLayer[] = [];
  private drawingEntries: DrawingEntry[] = [];

  private nextZOrder = 1;
  private dirty = new DirtyTracker();
  private compositeBuffer: Bitmap | undefined;
  private occluders = new OccluderIndex();

  private readonly factory: BitmapFactory;
  private readonly settings: CompositorSettings;

  constructor(picId: number, factory: BitmapFactory, settings: CompositorSettings = DEFAULT_COMPOSITOR_SETTINGS) {
    this.picId = picId;
    this.factory = factory;
    this.settings = settings;
  }

  // --- Background & legacy drawing ---

  getBackground(): BackgroundLayer | undefined {
    return this.background;
  }

  setBackground(layer: BackgroundLayer | undefined): void {
    if (this.background) this.dirty.addRegion(this.background.bounds);
    this.background = layer;
    this.dirty.markFull();
  }

  getDrawing(): DrawingLayer | undefined {
    return this.drawing;
  }

  /** Install the legacy drawing singleton. It takes the next z-order like any other layer. */
  setDrawing(layer: DrawingLayer | undefined): void {
    if (this.drawing) this.dirty.addRegion(this.drawing.bounds);
    if (layer) layer.setZOrder(this.nextZOrder++);
    this.drawing = layer;
    this.dirty.markFull();
  }

  // --- Insertion ---

  addCastLayer(layer: CastLayer | null | undefined): void {
    if (!layer) return;
    layer.setZOrder(this.nextZOrder++);
    this.casts.push(layer);
    this.dirty.markFull();
  }

  addTextLayer(layer: TextLayer | null | undefined): void {
    if (!layer) return;
    layer.setZOrder(this.nextZOrder++);
    this.texts.push(layer);
    this.dirty.markFull();
  }

  addDrawingEntry(entry: DrawingEntry | null | undefined): void {
    if (!entry) return;
    entry.setZOrder(this.nextZOrder++);
    this.drawingEntries.push(entry);
    this.dirty.markFull();
  }

  /** z-order the next added layer will receive. */
  getNextZOrder(): number {
    return this.nextZOrder;
  }

  // --- Removal ---

  /** Remove the layer showing cast `castId`. */
  removeCastLayer(castId: number): boolean {
    return this.removeFrom(this.casts, (l) => l.castId === castId, "cast", castId);
  }

  removeCastLayerById(layerId: number): boolean {
    return this.removeFrom(this.casts, (l) => l.id === layerId, "cast layer", layerId);
  }

  removeTextLayer(layerId: number): boolean {
    return this.removeFrom(this.texts, (l) => l.id === layerId, "text layer", layerId);
  }

  removeDrawingEntry(layerId: number): boolean {
    return this.removeFrom(this.drawingEntries, (l) => l.id === layerId, "drawing entry", layerId);
  }

  /**
   * Splice the first match out of `list`. Its bounds join the dirty region so
   * the vacated area repaints even when nothing else covers it.
   */
  private removeFrom<T extends Layer>(
    list: T[],
    match: (layer: T) => boolean,
    what: string,
    key: number,
  ): boolean {
    const index = list.findIndex(match);
    if (index < 0) {
      this.debug(`remove: ${what} not found, picId=${this.picId}, id=${key}`);
      return false;
    }
    const [removed] = list.splice(index, 1);
    this.dirty.addRegion(removed.bounds);
    this.dirty.markFull();
    return true;
  }

  clearCastLayers(): void {
    this.clearList(this.casts);
  }

  clearTextLayers(): void {
    this.clearList(this.texts);
  }

  clearDrawingEntries(): void {
    this.clearList(this.drawingEntries);
  }

  private clearList(list: Layer[]): void {
    for (const layer of list) this.dirty.addRegion(layer.bounds);
    list.length = 0;
    this.dirty.markFull();
  }

  /** Drop every layer and the composite buffer. The z-order counter keeps counting. */
  destroy(): void {
    this.background = undefined;
    this.drawing = undefined;
    this.casts = [];
    this.texts = [];
    this.drawingEntries = [];
    this.compositeBuffer = undefined;
    this.occluders.clear();
    this.dirty.markFull();
  }

  // --- Lookup ---

  getCastLayer(castId: number): CastLayer | undefined {
    return this.find(this.casts, (l) => l.castId === castId, "cast", castId);
  }

  getCastLayerById(layerId: number): CastLayer | undefined {
    return this.find(this.casts, (l) => l.id === layerId, "cast layer", layerId);
  }

  getTextLayer(layerId: number): TextLayer | undefined {
    return this.find(this.texts, (l) => l.id === layerId, "text layer", layerId);
  }

  getDrawingEntry(layerId: number): DrawingEntry | undefined {
    return this.find(this.drawingEntries, (l) => l.id === layerId, "drawing entry", layerId);
  }

  private find<T extends Layer>(
    list: readonly T[],
    match: (layer: T) => boolean,
    what: string,
    key: number,
  ): T | undefined {
    const found = list.find(match);
    if (!found) this.debug(`get: ${what} not found, picId=${this.picId}, id=${key}`);
    return found;
  }

  getCastLayers(): CastLayer[] {
    return [...this.casts];
  }

  getTextLayers(): TextLayer[] {
    return [...this.texts];
  }

  getDrawingEntries(): DrawingEntry[] {
    return [...this.drawingEntries];
  }

  getCastLayerCount(): number {
    return this.casts.length;
  }

  getTextLayerCount(): number {
    return this.texts.length;
  }

  getDrawingEntryCount(): number {
    return this.drawingEntries.length;
  }

  // --- Dirty tracking ---

  get dirtyRegion(): Rect {
    return this.dirty.dirtyRegion;
  }

  get fullDirty(): boolean {
    return this.dirty.fullDirty;
  }

  addDirtyRegion(rect: Rect): void {
    this.dirty.addRegion(rect);
  }

  /** Empty the region and drop the full-repaint flag. Layer flags are untouched. */
  clearDirtyRegion(): void {
    this.dirty.clear();
  }

  markFullDirty(): void {
    this.dirty.markFull();
  }

  isDirty(): boolean {
    if (this.dirty.isDirty()) return true;
    return this.allLayers().some((layer) => layer.dirty);
  }

  clearAllDirtyFlags(): void {
    for (const layer of this.allLayers()) layer.setDirty(false);
    this.dirty.clear();
  }

  // --- Ordering ---

  private allLayers(): Layer[] {
    const layers: Layer[] = [];
    if (this.background) layers.push(this.background);
    if (this.drawing) layers.push(this.drawing);
    layers.push(...this.drawingEntries, ...this.casts, ...this.texts);
    return layers;
  }

  /** Every layer in paint order (ascending z). */
  getAllLayersSorted(): Layer[] {
    return sortLayersByZOrder(this.allLayers());
  }

  /** Every layer, of any kind, painted after z-order `zOrder`. */
  getUpperLayers(zOrder: number): Layer[] {
    return this.allLayers().filter((layer) => layer.zOrder > zOrder);
  }

  // --- Compositing ---

  getCompositeBuffer(): Bitmap | undefined {
    return this.compositeBuffer;
  }

  setCompositeBuffer(buffer: Bitmap | undefined): void {
    this.compositeBuffer = buffer;
  }

  /**
   * Paint the stack into the composite buffer for `visibleRect`.
   *
   * A clean set returns the cached buffer untouched. Any dirtiness repaints
   * the whole buffer, skipping layers outside the rect and layers hidden
   * behind an opaque upper layer.
   */
  composite(visibleRect: Rect): Bitmap | undefined {
    if (isEmptyRect(visibleRect)) return this.compositeBuffer;
    if (!this.isDirty() && this.compositeBuffer) return this.compositeBuffer;

    const buffer = this.ensureBuffer(rectWidth(visibleRect), rectHeight(visibleRect));
    buffer.clear();

    const layers = this.getAllLayersSorted();
    const culling = this.settings.occlusionCulling;
    if (culling) this.occluders.build(layers);

    for (const layer of layers) {
      if (!isLayerVisible(layer, visibleRect)) continue;
      if (culling && shouldSkipLayer(layer, this.occluders.occludersOf(layer))) continue;

      const image = layer.getImage();
      if (!image) continue;

      const bounds = layer.bounds;
      buffer.drawImage(image, bounds.minX - visibleRect.minX, bounds.minY - visibleRect.minY);
    }

    this.clearAllDirtyFlags();
    return buffer;
  }

  private ensureBuffer(width: number, height: number): Bitmap {
    const current = this.compositeBuffer;
    if (current && current.width === width && current.height === height) return current;
    const buffer = this.factory.create(width, height);
    this.compositeBuffer = buffer;
    return buffer;
  }

  private debug(message: string): void {
    if (this.settings.debugLogging) console.debug(`[PictureLayerSet] ${message}`);
  }
}
