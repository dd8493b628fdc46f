import type { Bitmap } from "../render/Bitmap";
import { bitmapBounds } from "../render/Bitmap";
import type { CastRecord, Color, Rect } from "../types";
import { colorsEqual } from "../types";
import { intersectRect, isEmptyRect, rect } from "../geometry/Rect";
import { BaseLayer } from "./BaseLayer";

/**
 * Produces the displayable image of a cast from its source picture.
 * Colour-key substitution lives behind this function, outside the core.
 */
export type CastImageBuilder = (
  source: Bitmap,
  srcRect: Rect,
  transColor: Color | undefined,
) => Bitmap | undefined;

export const subImageCastBuilder: CastImageBuilder = (source, srcRect) => source.subImage(srcRect);

export interface CastLayerInit {
  id: number;
  castId: number;
  picId: number;
  srcPicId: number;
  x: number;
  y: number;
  srcX: number;
  srcY: number;
  width: number;
  height: number;
  transColor?: Color;
  source?: Bitmap;
  imageBuilder?: CastImageBuilder;
}

/**
 * A sprite copied out of a source picture's sub-rectangle and shown at a
 * destination position. The displayed image is a cache over
 * (source, source rect, colour key); dropping it makes the next
 * `getImage()` rebuild through the image builder.
 */
export class CastLayer extends BaseLayer {
  readonly kind = "cast" as const;

  readonly castId: number;
  private _picId: number;
  readonly srcPicId: number;
  private x: number;
  private y: number;
  private srcX: number;
  private srcY: number;
  private width: number;
  private height: number;
  private _transColor: Color | undefined;
  private image: Bitmap | undefined;
  private source: Bitmap | undefined;
  private readonly imageBuilder: CastImageBuilder;

  private constructor(init: CastLayerInit) {
    super({ id: init.id, bounds: rect(init.x, init.y, init.width, init.height) });
    this.castId = init.castId;
    this._picId = init.picId;
    this.srcPicId = init.srcPicId;
    this.x = init.x;
    this.y = init.y;
    this.srcX = init.srcX;
    this.srcY = init.srcY;
    this.width = init.width;
    this.height = init.height;
    this._transColor = init.transColor ? { ...init.transColor } : undefined;
    this.source = init.source;
    this.imageBuilder = init.imageBuilder ?? subImageCastBuilder;
  }

  /** Undefined for a non-positive size. */
  static create(init: CastLayerInit): CastLayer | undefined {
    if (init.width <= 0 || init.height <= 0) {
      console.warn(
        `[CastLayer] invalid size, id=${init.id}, castId=${init.castId}, width=${init.width}, height=${init.height}`,
      );
      return undefined;
    }
    return new CastLayer(init);
  }

  get picId(): number {
    return this._picId;
  }

  setPicId(picId: number): void {
    this._picId = picId;
  }

  get position(): { x: number; y: number } {
    return { x: this.x, y: this.y };
  }

  get sourceRect(): Rect {
    return rect(this.srcX, this.srcY, this.width, this.height);
  }

  get size(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  get transColor(): Color | undefined {
    return this._transColor ? { ...this._transColor } : undefined;
  }

  hasTransColor(): boolean {
    return this._transColor !== undefined;
  }

  hasCachedImage(): boolean {
    return this.image !== undefined;
  }

  getImage(): Bitmap | undefined {
    if (this.image) return this.image;
    if (!this.source) return undefined;
    this.rebuildCache(this.source);
    return this.image;
  }

  invalidate(): void {
    this._dirty = true;
    this.image = undefined;
  }

  /** Install a prepared image, e.g. one the cast manager already colour-keyed. */
  setCachedImage(image: Bitmap | undefined): void {
    this.image = image;
    this._dirty = false;
  }

  setSourceImage(source: Bitmap | undefined): void {
    this.source = source;
    this.invalidate();
  }

  setPosition(x: number, y: number): void {
    if (x === this.x && y === this.y) return;
    this.x = x;
    this.y = y;
    this.syncBounds();
    this._dirty = true;
  }

  setSourceRect(srcX: number, srcY: number, width: number, height: number): void {
    if (srcX === this.srcX && srcY === this.srcY && width === this.width && height === this.height) {
      return;
    }
    this.srcX = srcX;
    this.srcY = srcY;
    this.width = width;
    this.height = height;
    this.syncBounds();
    this.invalidate();
  }

  setTransColor(transColor: Color | undefined): void {
    if (colorsEqual(transColor, this._transColor)) return;
    this._transColor = transColor ? { ...transColor } : undefined;
    this.invalidate();
  }

  /**
   * Mirror the cast manager's record. Position changes only move the layer;
   * source-rect or colour-key changes also drop the cached image.
   */
  updateFromCast(cast: CastRecord | null | undefined): void {
    if (!cast) return;

    const posChanged = this.x !== cast.x || this.y !== cast.y;
    const srcChanged =
      this.srcX !== cast.srcX ||
      this.srcY !== cast.srcY ||
      this.width !== cast.width ||
      this.height !== cast.height;
    const transChanged = !colorsEqual(this._transColor, cast.transColor);

    if (posChanged) {
      this.x = cast.x;
      this.y = cast.y;
    }
    if (srcChanged) {
      this.srcX = cast.srcX;
      this.srcY = cast.srcY;
      this.width = cast.width;
      this.height = cast.height;
    }
    if (transChanged) {
      this._transColor = cast.transColor ? { ...cast.transColor } : undefined;
    }
    if (posChanged || srcChanged) this.syncBounds();

    if (srcChanged || transChanged) {
      this.invalidate();
    } else if (posChanged) {
      this._dirty = true;
    }

    this.setVisible(cast.visible);
  }

  private syncBounds(): void {
    this._bounds = rect(this.x, this.y, this.width, this.height);
  }

  private rebuildCache(source: Bitmap): void {
    const srcRect = intersectRect(this.sourceRect, bitmapBounds(source));
    this.image = isEmptyRect(srcRect)
      ? undefined
      : this.imageBuilder(source, srcRect, this._transColor);
  }
}
