import type { BitmapFactory } from "../render/Bitmap";
import type { CappedLayerKind, Color, PictureSource } from "../types";
import { ResourceExhaustedError } from "../errors";
import { BackgroundLayer } from "../layers/BackgroundLayer";
import type { CompositorSettings } from "../settings/CompositorSettings";
import { layerLimit, mergeSettings } from "../settings/CompositorSettings";
import { PictureLayerSet } from "./PictureLayerSet";
import { WindowLayerSet } from "./WindowLayerSet";

/**
 * Registry of layer sets keyed by picture id and by window id, plus the
 * layer-id counter every collaborator draws from.
 *
 * `getOrCreate*` is first-writer-wins: once a set exists, later calls return
 * it and ignore their construction arguments.
 */
export class LayerManager {
  private pictureSets = new Map<number, PictureLayerSet>();
  private windowSets = new Map<number, WindowLayerSet>();
  private nextLayerId = 1;

  private readonly factory: BitmapFactory;
  readonly settings: CompositorSettings;

  constructor(factory: BitmapFactory, settings?: Partial<CompositorSettings>) {
    this.factory = factory;
    this.settings = mergeSettings(settings);
  }

  /** Ids are never reused, not even across `clear()`. */
  getNextLayerId(): number {
    return this.nextLayerId++;
  }

  // --- Pictures ---

  getOrCreatePictureLayerSet(picId: number): PictureLayerSet {
    let set = this.pictureSets.get(picId);
    if (!set) {
      set = new PictureLayerSet(picId, this.factory, this.settings);
      this.pictureSets.set(picId, set);
    }
    return set;
  }

  getPictureLayerSet(picId: number): PictureLayerSet | undefined {
    return this.pictureSets.get(picId);
  }

  /** Remove a picture's set and release its layers. */
  deletePictureLayerSet(picId: number): boolean {
    const set = this.pictureSets.get(picId);
    if (!set) return false;
    set.destroy();
    this.pictureSets.delete(picId);
    return true;
  }

  getAllPictureLayerSets(): Map<number, PictureLayerSet> {
    return new Map(this.pictureSets);
  }

  getPictureLayerSetCount(): number {
    return this.pictureSets.size;
  }

  /**
   * Give picture `picId` a background layer showing the picture manager's
   * image for it. A NotFoundError from the source propagates unchanged and
   * leaves the registry as it was.
   */
  attachBackground(picId: number, source: PictureSource): BackgroundLayer {
    const pic = source.getPic(picId);
    const layer = new BackgroundLayer(this.getNextLayerId(), picId, pic.image);
    this.getOrCreatePictureLayerSet(picId).setBackground(layer);
    return layer;
  }

  /**
   * Throw when `set` already holds the configured maximum of `kind` layers.
   * The layer sets never check this themselves.
   */
  checkLayerCapacity(set: PictureLayerSet, kind: CappedLayerKind): void {
    const limit = layerLimit(this.settings, kind);
    const count = kind === "cast" ? set.getCastLayerCount() : set.getTextLayerCount();
    if (count >= limit) {
      throw new ResourceExhaustedError(`${kind} layers for picture ${set.picId}`, limit);
    }
  }

  // --- Windows ---

  /** Undefined when no set exists yet and the size is invalid. */
  getOrCreateWindowLayerSet(winId: number, width: number, height: number, bgColor: Color): WindowLayerSet | undefined {
    const existing = this.windowSets.get(winId);
    if (existing) return existing;
    const set = WindowLayerSet.create(winId, width, height, bgColor, this.settings);
    if (set) this.windowSets.set(winId, set);
    return set;
  }

  getWindowLayerSet(winId: number): WindowLayerSet | undefined {
    return this.windowSets.get(winId);
  }

  deleteWindowLayerSet(winId: number): boolean {
    const set = this.windowSets.get(winId);
    if (!set) return false;
    set.clearLayers();
    set.setCompositeBuffer(undefined);
    this.windowSets.delete(winId);
    return true;
  }

  getWindowLayerSetCount(): number {
    return this.windowSets.size;
  }

  /** Forget every set. The layer-id counter keeps counting. */
  clear(): void {
    for (const set of this.pictureSets.values()) set.destroy();
    this.pictureSets.clear();
    this.windowSets.clear();
  }
}
