import type { Bitmap } from "../render/Bitmap";
import type { TextRecord } from "../types";
import { EMPTY_RECT, rect } from "../geometry/Rect";
import { BaseLayer } from "./BaseLayer";

/**
 * A rendered string placed at (x, y). Glyph rasterisation happens outside;
 * the layer keeps the result and derives its bounds from it.
 */
export class TextLayer extends BaseLayer {
  readonly kind = "text" as const;

  private _picId: number;
  private x: number;
  private y: number;
  private _text: string;
  private image: Bitmap | undefined;

  constructor(id: number, picId: number, x: number, y: number, text: string, image?: Bitmap) {
    // A layer built with its image is already up to date
    super({ id, dirty: image === undefined });
    this._picId = picId;
    this.x = x;
    this.y = y;
    this._text = text;
    this.image = image;
    this.syncBounds();
  }

  get picId(): number {
    return this._picId;
  }

  setPicId(picId: number): void {
    this._picId = picId;
  }

  get text(): string {
    return this._text;
  }

  get position(): { x: number; y: number } {
    return { x: this.x, y: this.y };
  }

  get size(): { width: number; height: number } {
    return { width: this.image?.width ?? 0, height: this.image?.height ?? 0 };
  }

  hasImage(): boolean {
    return this.image !== undefined;
  }

  getImage(): Bitmap | undefined {
    return this.image;
  }

  invalidate(): void {
    this._dirty = true;
    this.image = undefined;
  }

  /** Install the rasterised text. Bounds follow the image; the layer is clean afterwards. */
  setImage(image: Bitmap | undefined): void {
    this.image = image;
    this.syncBounds();
    this._dirty = false;
  }

  setText(text: string): void {
    if (text === this._text) return;
    this._text = text;
    this.invalidate();
  }

  setPosition(x: number, y: number): void {
    if (x === this.x && y === this.y) return;
    this.x = x;
    this.y = y;
    this.syncBounds();
    this._dirty = true;
  }

  /** Mirror the text manager's record. */
  updateFromText(record: TextRecord | null | undefined): void {
    if (!record) return;
    this.setPosition(record.x, record.y);
    this.setText(record.text);
    if (record.visible !== undefined) this.setVisible(record.visible);
  }

  private syncBounds(): void {
    this._bounds = this.image
      ? rect(this.x, this.y, this.image.width, this.image.height)
      : { ...EMPTY_RECT };
  }
}
