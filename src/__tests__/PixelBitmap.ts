/**
 * A tiny bitmap whose pixels are colour names, so composite results can be
 * asserted pixel by pixel. `null` is transparent; drawing copies only the
 * non-transparent pixels of the source.
 */

import type { Bitmap, BitmapFactory } from "../render/Bitmap";
import { bitmapBounds } from "../render/Bitmap";
import type { Rect } from "../types";
import { intersectRect, isEmptyRect } from "../geometry/Rect";

export type Pixel = string | null;

export class PixelBitmap implements Bitmap {
  private pixels: Pixel[];

  constructor(
    public readonly width: number,
    public readonly height: number,
    fill: Pixel = null,
  ) {
    this.pixels = new Array<Pixel>(width * height).fill(fill);
  }

  pixelAt(x: number, y: number): Pixel {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    return this.pixels[y * this.width + x];
  }

  setPixel(x: number, y: number, value: Pixel): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.pixels[y * this.width + x] = value;
  }

  subImage(r: Rect): Bitmap {
    const clipped = intersectRect(r, bitmapBounds(this));
    if (isEmptyRect(clipped)) return new PixelBitmap(0, 0);
    const out = new PixelBitmap(clipped.maxX - clipped.minX, clipped.maxY - clipped.minY);
    for (let y = clipped.minY; y < clipped.maxY; y++) {
      for (let x = clipped.minX; x < clipped.maxX; x++) {
        out.setPixel(x - clipped.minX, y - clipped.minY, this.pixelAt(x, y));
      }
    }
    return out;
  }

  drawImage(src: Bitmap, dx: number, dy: number, alpha = 1): void {
    if (!(src instanceof PixelBitmap)) throw new Error("PixelBitmap can only draw PixelBitmaps");
    if (alpha <= 0) return;
    for (let y = 0; y < src.height; y++) {
      for (let x = 0; x < src.width; x++) {
        const value = src.pixelAt(x, y);
        if (value !== null) this.setPixel(x + dx, y + dy, value);
      }
    }
  }

  clear(): void {
    this.pixels.fill(null);
  }
}

export class PixelBitmapFactory implements BitmapFactory {
  create(width: number, height: number): PixelBitmap {
    return new PixelBitmap(width, height);
  }
}
