import type { Bitmap } from "../render/Bitmap";
import type { LayerKind, Rect } from "../types";
import { EMPTY_RECT, rectsEqual } from "../geometry/Rect";

export interface BaseLayerInit {
  id: number;
  bounds?: Rect;
  zOrder?: number;
  visible?: boolean;
  dirty?: boolean;
  opaque?: boolean;
}

/**
 * State every layer kind shares: identity, placement, paint order and the
 * flags the compositor reads. Setters only dirty the layer on a real change.
 */
export abstract class BaseLayer {
  abstract readonly kind: LayerKind;

  protected _id: number;
  protected _bounds: Rect;
  protected _zOrder: number;
  protected _visible: boolean;
  protected _dirty: boolean;
  protected _opaque: boolean;

  constructor(init: BaseLayerInit) {
    this._id = init.id;
    this._bounds = init.bounds ? { ...init.bounds } : { ...EMPTY_RECT };
    this._zOrder = init.zOrder ?? 0;
    this._visible = init.visible ?? true;
    this._dirty = init.dirty ?? true;
    this._opaque = init.opaque ?? false;
  }

  get id(): number {
    return this._id;
  }

  setId(id: number): void {
    this._id = id;
  }

  get bounds(): Rect {
    return { ...this._bounds };
  }

  setBounds(bounds: Rect): void {
    if (rectsEqual(this._bounds, bounds)) return;
    this._bounds = { ...bounds };
    this._dirty = true;
  }

  get zOrder(): number {
    return this._zOrder;
  }

  /** Paint-order slot. Assigned by the owning layer set, not a visual change. */
  setZOrder(zOrder: number): void {
    this._zOrder = zOrder;
  }

  get visible(): boolean {
    return this._visible;
  }

  setVisible(visible: boolean): void {
    if (visible === this._visible) return;
    this._visible = visible;
    this._dirty = true;
  }

  get opaque(): boolean {
    return this._opaque;
  }

  setOpaque(opaque: boolean): void {
    if (opaque === this._opaque) return;
    this._opaque = opaque;
    this._dirty = true;
  }

  get dirty(): boolean {
    return this._dirty;
  }

  setDirty(dirty: boolean): void {
    this._dirty = dirty;
  }

  /** Current image, rebuilt from authoritative data if the cache was dropped. */
  abstract getImage(): Bitmap | undefined;

  /** Force a repaint. Kinds with a derived image also drop that cache. */
  invalidate(): void {
    this._dirty = true;
  }
}
