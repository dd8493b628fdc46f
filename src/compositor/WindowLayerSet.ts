import type { Bitmap } from "../render/Bitmap";
import type { Color, Rect } from "../types";
import type { Layer } from "../layers/Layer";
import { sortLayersByZOrder } from "../layers/Layer";
import type { CastLayer } from "../layers/CastLayer";
import type { CompositorSettings } from "../settings/CompositorSettings";
import { DEFAULT_COMPOSITOR_SETTINGS } from "../settings/CompositorSettings";
import { DirtyTracker } from "./DirtyTracker";

/**
 * Layers that belong to a window rather than a picture: one ordered list
 * with its own z-order counter (starting at 1), a background colour and a
 * size. Dirty tracking works as in PictureLayerSet.
 */
export class WindowLayerSet {
  readonly winId: number;

  private _bgColor: Color;
  private _width: number;
  private _height: number;
  private layers: Layer[] = [];
  private nextZOrder = 1;
  private dirty = new DirtyTracker();
  private compositeBuffer: Bitmap | undefined;
  private readonly settings: CompositorSettings;

  private constructor(winId: number, width: number, height: number, bgColor: Color, settings: CompositorSettings) {
    this.winId = winId;
    this._width = width;
    this._height = height;
    this._bgColor = { ...bgColor };
    this.settings = settings;
  }

  /** Undefined for a non-positive size. */
  static create(
    winId: number,
    width: number,
    height: number,
    bgColor: Color,
    settings: CompositorSettings = DEFAULT_COMPOSITOR_SETTINGS,
  ): WindowLayerSet | undefined {
    if (width <= 0 || height <= 0) {
      console.warn(`[WindowLayerSet] invalid size, winId=${winId}, width=${width}, height=${height}`);
      return undefined;
    }
    return new WindowLayerSet(winId, width, height, bgColor, settings);
  }

  get bgColor(): Color {
    return { ...this._bgColor };
  }

  setBgColor(color: Color): void {
    this._bgColor = { ...color };
    this.dirty.markFull();
  }

  get size(): { width: number; height: number } {
    return { width: this._width, height: this._height };
  }

  /** A new size also drops the composite buffer. */
  setSize(width: number, height: number): void {
    if (width === this._width && height === this._height) return;
    this._width = width;
    this._height = height;
    this.compositeBuffer = undefined;
    this.dirty.markFull();
  }

  // --- Layers ---

  addLayer(layer: Layer | null | undefined): void {
    if (!layer) return;
    layer.setZOrder(this.nextZOrder++);
    this.layers.push(layer);
    this.dirty.markFull();
  }

  removeLayer(layerId: number): boolean {
    return this.removeWhere((l) => l.id === layerId, `layer not found, winId=${this.winId}, layerId=${layerId}`);
  }

  getLayer(layerId: number): Layer | undefined {
    const layer = this.layers.find((l) => l.id === layerId);
    if (!layer) this.debug(`getLayer: layer not found, winId=${this.winId}, layerId=${layerId}`);
    return layer;
  }

  getLayerCount(): number {
    return this.layers.length;
  }

  /** Layers in insertion order. */
  getLayers(): Layer[] {
    return [...this.layers];
  }

  getLayersSorted(): Layer[] {
    return sortLayersByZOrder([...this.layers]);
  }

  getTopmostLayer(): Layer | undefined {
    let topmost: Layer | undefined;
    for (const layer of this.layers) {
      if (!topmost || layer.zOrder > topmost.zOrder) topmost = layer;
    }
    return topmost;
  }

  getNextZOrder(): number {
    return this.nextZOrder;
  }

  /** Drop every layer and restart the z-order counter. */
  clearLayers(): void {
    this.layers = [];
    this.nextZOrder = 1;
    this.dirty.markFull();
  }

  // --- Casts ---

  getCastLayer(castId: number): CastLayer | undefined {
    return this.getAllCastLayers().find((l) => l.castId === castId);
  }

  removeCastLayer(castId: number): boolean {
    return this.removeWhere((l) => l.kind === "cast" && l.castId === castId, `cast not found, winId=${this.winId}, castId=${castId}`);
  }

  getCastLayerCount(): number {
    return this.getAllCastLayers().length;
  }

  getAllCastLayers(): CastLayer[] {
    const casts: CastLayer[] = [];
    for (const layer of this.layers) {
      if (layer.kind === "cast") casts.push(layer);
    }
    return casts;
  }

  private removeWhere(match: (layer: Layer) => boolean, notFound: string): boolean {
    const index = this.layers.findIndex(match);
    if (index < 0) {
      this.debug(`remove: ${notFound}`);
      return false;
    }
    const [removed] = this.layers.splice(index, 1);
    this.dirty.addRegion(removed.bounds);
    this.dirty.markFull();
    return true;
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

  clearDirtyRegion(): void {
    this.dirty.clear();
  }

  markFullDirty(): void {
    this.dirty.markFull();
  }

  isDirty(): boolean {
    return this.dirty.isDirty() || this.layers.some((layer) => layer.dirty);
  }

  clearAllDirtyFlags(): void {
    for (const layer of this.layers) layer.setDirty(false);
    this.dirty.clear();
  }

  getCompositeBuffer(): Bitmap | undefined {
    return this.compositeBuffer;
  }

  setCompositeBuffer(buffer: Bitmap | undefined): void {
    this.compositeBuffer = buffer;
  }

  private debug(message: string): void {
    if (this.settings.debugLogging) console.debug(`[WindowLayerSet] ${message}`);
  }
}
