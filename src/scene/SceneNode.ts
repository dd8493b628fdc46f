import type { Bitmap } from "../render/Bitmap";
import type { Point, Rect } from "../types";
import { EMPTY_RECT } from "../geometry/Rect";
import type { ZPath } from "./ZPath";

/** Replaces the default image draw for a node (e.g. colour-keyed casts). */
export type CustomDrawFn = (surface: Bitmap, x: number, y: number, alpha: number) => void;

/**
 * One drawable in the scene tree.
 *
 * The image is borrowed from the bitmap subsystem and never released here.
 * `parent` is a back-reference only: the parent's child list and the owning
 * SceneGraph's registry are what keep a node alive.
 */
export class SceneNode {
  readonly id: number;

  private _image: Bitmap | undefined;
  private _x = 0;
  private _y = 0;
  private _visible = true;
  private _alpha = 1;
  private _zPath: ZPath | undefined;
  private _parent: SceneNode | null = null;
  private _children: SceneNode[] = [];
  private _dirty = true;
  private _childOffsetX = 0;
  private _childOffsetY = 0;
  private _customDraw: CustomDrawFn | undefined;

  /** Set by the owning graph; called on every parent/child or ZPath change. */
  private readonly onOrderChange: (() => void) | undefined;

  constructor(id: number, image?: Bitmap, onOrderChange?: () => void) {
    this.id = id;
    this._image = image;
    this.onOrderChange = onOrderChange;
  }

  // --- Image ---

  get image(): Bitmap | undefined {
    return this._image;
  }

  setImage(image: Bitmap | undefined): void {
    if (image === this._image) return;
    this._image = image;
    this._dirty = true;
  }

  /** Image bounds at the origin, empty without an image. */
  bounds(): Rect {
    if (!this._image) return { ...EMPTY_RECT };
    return { minX: 0, minY: 0, maxX: this._image.width, maxY: this._image.height };
  }

  size(): { width: number; height: number } {
    return { width: this._image?.width ?? 0, height: this._image?.height ?? 0 };
  }

  // --- Position ---

  get position(): Point {
    return { x: this._x, y: this._y };
  }

  setPosition(x: number, y: number): void {
    if (x === this._x && y === this._y) return;
    this._x = x;
    this._y = y;
    this._dirty = true;
  }

  get childOffset(): Point {
    return { x: this._childOffsetX, y: this._childOffsetY };
  }

  /** Extra translation applied to every child (window content area, picture origin). */
  setChildOffset(x: number, y: number): void {
    if (x === this._childOffsetX && y === this._childOffsetY) return;
    this._childOffsetX = x;
    this._childOffsetY = y;
    this._dirty = true;
  }

  absolutePosition(): Point {
    if (!this._parent) return { x: this._x, y: this._y };
    const p = this._parent.absolutePosition();
    return {
      x: this._x + p.x + this._parent._childOffsetX,
      y: this._y + p.y + this._parent._childOffsetY,
    };
  }

  // --- Visibility & alpha ---

  get visible(): boolean {
    return this._visible;
  }

  setVisible(visible: boolean): void {
    if (visible === this._visible) return;
    this._visible = visible;
    this._dirty = true;
  }

  /** False if this node or any ancestor is hidden. Own flags are untouched. */
  isEffectivelyVisible(): boolean {
    if (!this._visible) return false;
    return this._parent ? this._parent.isEffectivelyVisible() : true;
  }

  get alpha(): number {
    return this._alpha;
  }

  /** Clamped to [0, 1]. NaN counts as 0. */
  setAlpha(alpha: number): void {
    const clamped = Number.isNaN(alpha) ? 0 : Math.min(Math.max(alpha, 0), 1);
    if (clamped === this._alpha) return;
    this._alpha = clamped;
    this._dirty = true;
  }

  effectiveAlpha(): number {
    return this._parent ? this._alpha * this._parent.effectiveAlpha() : this._alpha;
  }

  // --- Z-Path ---

  get zPath(): ZPath | undefined {
    return this._zPath;
  }

  setZPath(zPath: ZPath | undefined): void {
    if (zPath === this._zPath) return;
    if (zPath && this._zPath && zPath.equals(this._zPath)) return;
    this._zPath = zPath;
    this._dirty = true;
    this.onOrderChange?.();
  }

  // --- Hierarchy ---

  get parent(): SceneNode | null {
    return this._parent;
  }

  /** Copy of the child list, in insertion order. */
  get children(): readonly SceneNode[] {
    return [...this._children];
  }

  hasChildren(): boolean {
    return this._children.length > 0;
  }

  /**
   * Move this node under `parent` (or detach it with null).
   * The ZPath is left as is; the caller recomputes it.
   */
  setParent(parent: SceneNode | null): void {
    if (parent === this._parent) return;
    if (parent && (parent === this || parent.hasAncestor(this))) return;
    if (this._parent) this._parent.detachChild(this.id);
    if (parent) parent._children.push(this);
    this._parent = parent;
    this._dirty = true;
    this.onOrderChange?.();
  }

  addChild(child: SceneNode | null | undefined): void {
    if (!child) return;
    child.setParent(this);
  }

  /** Unknown ids are ignored. Remaining children keep their order. */
  removeChild(childId: number): void {
    const child = this.detachChild(childId);
    if (!child) return;
    child._parent = null;
    child._dirty = true;
    this.onOrderChange?.();
  }

  hasAncestor(node: SceneNode): boolean {
    for (let p = this._parent; p; p = p._parent) {
      if (p === node) return true;
    }
    return false;
  }

  private detachChild(childId: number): SceneNode | undefined {
    const index = this._children.findIndex((c) => c.id === childId);
    if (index < 0) return undefined;
    const [child] = this._children.splice(index, 1);
    return child;
  }

  // --- Drawing ---

  get customDraw(): CustomDrawFn | undefined {
    return this._customDraw;
  }

  setCustomDraw(fn: CustomDrawFn | undefined): void {
    this._customDraw = fn;
    this._dirty = true;
  }

  // --- Dirty tracking ---

  get dirty(): boolean {
    return this._dirty;
  }

  clearDirty(): void {
    this._dirty = false;
  }
}
