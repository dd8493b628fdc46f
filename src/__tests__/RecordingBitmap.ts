/**
 * A Bitmap that records every call made on it, so tests can assert the exact
 * draw sequence a compositor pass or scene draw produced.
 */

import type { Bitmap, BitmapFactory } from "../render/Bitmap";
import { bitmapBounds } from "../render/Bitmap";
import type { Rect } from "../types";
import { intersectRect, rectHeight, rectWidth } from "../geometry/Rect";

export interface RecordedCall {
  method: string;
  args: unknown[];
}

export class RecordingBitmap implements Bitmap {
  readonly calls: RecordedCall[] = [];

  constructor(
    public readonly width: number,
    public readonly height: number,
    public readonly label = "bitmap",
  ) {}

  subImage(r: Rect): Bitmap {
    const clipped = intersectRect(r, bitmapBounds(this));
    this.calls.push({ method: "subImage", args: [clipped] });
    return new RecordingBitmap(rectWidth(clipped), rectHeight(clipped), `${this.label}.sub`);
  }

  drawImage(src: Bitmap, dx: number, dy: number, alpha = 1): void {
    this.calls.push({ method: "drawImage", args: [labelOf(src), dx, dy, alpha] });
  }

  clear(): void {
    this.calls.push({ method: "clear", args: [] });
  }

  /** Recorded calls of one method, args only. */
  callsTo(method: string): unknown[][] {
    return this.calls.filter((c) => c.method === method).map((c) => c.args);
  }
}

export class RecordingBitmapFactory implements BitmapFactory {
  readonly created: RecordingBitmap[] = [];

  create(width: number, height: number): RecordingBitmap {
    const bitmap = new RecordingBitmap(width, height, `created#${this.created.length + 1}`);
    this.created.push(bitmap);
    return bitmap;
  }
}

function labelOf(bitmap: Bitmap): string {
  return bitmap instanceof RecordingBitmap ? bitmap.label : "unknown";
}
