import type { Bitmap, BitmapFactory } from "../render/Bitmap";
import { bitmapBounds } from "../render/Bitmap";
import { EMPTY_RECT, rect } from "../geometry/Rect";
import { BaseLayer } from "./BaseLayer";

/**
 * Legacy per-picture drawing surface: one bitmap that draw operations are
 * baked into. Newer code records a DrawingEntry per operation instead.
 */
export class DrawingLayer extends BaseLayer {
  readonly kind = "drawing" as const;

  private _picId: number;
  private image: Bitmap | undefined;
  private readonly factory: BitmapFactory;

  constructor(id: number, picId: number, factory: BitmapFactory, image?: Bitmap) {
    super({ id, bounds: image ? bitmapBounds(image) : undefined });
    this._picId = picId;
    this.factory = factory;
    this.image = image;
  }

  /** Blank layer of the given size; a non-positive size leaves it without an image. */
  static withSize(
    id: number,
    picId: number,
    factory: BitmapFactory,
    width: number,
    height: number,
  ): DrawingLayer {
    const image = width > 0 && height > 0 ? factory.create(width, height) : undefined;
    return new DrawingLayer(id, picId, factory, image);
  }

  get picId(): number {
    return this._picId;
  }

  setPicId(picId: number): void {
    this._picId = picId;
  }

  getImage(): Bitmap | undefined {
    return this.image;
  }

  setImage(image: Bitmap | undefined): void {
    this.image = image;
    this._bounds = image ? bitmapBounds(image) : { ...EMPTY_RECT };
    this._dirty = true;
  }

  clear(): void {
    if (!this.image) return;
    this.image.clear();
    this._dirty = true;
  }

  drawImage(src: Bitmap, x: number, y: number): void {
    if (!this.image) return;
    this.image.drawImage(src, x, y);
    this._dirty = true;
  }

  drawSubImage(
    src: Bitmap,
    destX: number,
    destY: number,
    srcX: number,
    srcY: number,
    width: number,
    height: number,
  ): void {
    if (!this.image) return;
    this.image.drawImage(src.subImage(rect(srcX, srcY, width, height)), destX, destY);
    this._dirty = true;
  }

  /** Replace the bitmap with a blank one; contents are not preserved. */
  resize(width: number, height: number): void {
    if (width > 0 && height > 0) {
      this.image = this.factory.create(width, height);
      this._bounds = rect(0, 0, width, height);
    } else {
      this.image = undefined;
      this._bounds = { ...EMPTY_RECT };
    }
    this._dirty = true;
  }

  /** Replace the contents with `src`, resizing to match. */
  copyFrom(src: Bitmap): void {
    let image = this.image;
    if (!image || image.width !== src.width || image.height !== src.height) {
      image = this.factory.create(src.width, src.height);
      this.image = image;
      this._bounds = bitmapBounds(src);
    }
    image.clear();
    image.drawImage(src, 0, 0);
    this._dirty = true;
  }
}
