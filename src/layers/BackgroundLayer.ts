import type { Bitmap } from "../render/Bitmap";
import { bitmapBounds } from "../render/Bitmap";
import { EMPTY_RECT } from "../geometry/Rect";
import { BaseLayer } from "./BaseLayer";

/** z-order reserved for the background of every layer set. */
export const Z_ORDER_BACKGROUND = 0;

/**
 * The picture a surface is cleared to. Always paints first and is opaque
 * unless told otherwise. The image may arrive after construction.
 */
export class BackgroundLayer extends BaseLayer {
  readonly kind = "background" as const;

  private _picId: number;
  private image: Bitmap | undefined;

  constructor(id: number, picId: number, image?: Bitmap) {
    super({
      id,
      bounds: image ? bitmapBounds(image) : undefined,
      zOrder: Z_ORDER_BACKGROUND,
      opaque: true,
    });
    this._picId = picId;
    this.image = image;
  }

  get picId(): number {
    return this._picId;
  }

  setPicId(picId: number): void {
    this._picId = picId;
  }

  /** Background stays at the bottom whatever a caller asks for. */
  setZOrder(_zOrder: number): void {
    this._zOrder = Z_ORDER_BACKGROUND;
  }

  getImage(): Bitmap | undefined {
    return this.image;
  }

  setImage(image: Bitmap | undefined): void {
    this.image = image;
    this._bounds = image ? bitmapBounds(image) : { ...EMPTY_RECT };
    this._dirty = true;
  }
}
