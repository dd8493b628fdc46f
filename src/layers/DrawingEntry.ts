import type { Bitmap } from "../render/Bitmap";
import { rect } from "../geometry/Rect";
import { BaseLayer } from "./BaseLayer";

export interface DrawingEntryInit {
  id: number;
  picId: number;
  image: Bitmap;
  destX: number;
  destY: number;
  width: number;
  height: number;
  zOrder?: number;
}

/**
 * The result of one freeform draw or transfer operation, kept as its own
 * layer so later casts and text interleave with it in operation order.
 */
export class DrawingEntry extends BaseLayer {
  readonly kind = "drawing-entry" as const;

  readonly picId: number;
  readonly destX: number;
  readonly destY: number;
  readonly width: number;
  readonly height: number;
  private readonly image: Bitmap;

  private constructor(init: DrawingEntryInit) {
    super({
      id: init.id,
      bounds: rect(init.destX, init.destY, init.width, init.height),
      zOrder: init.zOrder,
    });
    this.picId = init.picId;
    this.image = init.image;
    this.destX = init.destX;
    this.destY = init.destY;
    this.width = init.width;
    this.height = init.height;
  }

  /** Undefined for a non-positive size. */
  static create(init: DrawingEntryInit): DrawingEntry | undefined {
    if (init.width <= 0 || init.height <= 0) return undefined;
    return new DrawingEntry(init);
  }

  getImage(): Bitmap {
    return this.image;
  }
}
