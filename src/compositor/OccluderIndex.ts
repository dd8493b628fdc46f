import RBush from "rbush";
import type { Layer } from "../layers/Layer";
import { containsRect, isEmptyRect } from "../geometry/Rect";

interface OccluderItem {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  zOrder: number;
  layer: Layer;
}

/**
 * R-tree of the layers that can hide others (visible, opaque, non-empty).
 * Built once per composite pass so each layer's occlusion test only looks
 * at uppers that overlap it instead of every upper layer in the set.
 */
export class OccluderIndex {
  private tree = new RBush<OccluderItem>();

  /**
   * Build the index from a layer list.
   * Replaces any existing index.
   */
  build(layers: readonly Layer[]): void {
    this.tree.clear();
    const items: OccluderItem[] = [];
    for (const layer of layers) {
      if (!layer.visible || !layer.opaque) continue;
      const b = layer.bounds;
      if (isEmptyRect(b)) continue;
      items.push({ minX: b.minX, minY: b.minY, maxX: b.maxX, maxY: b.maxY, zOrder: layer.zOrder, layer });
    }
    this.tree.load(items);
  }

  /** Indexed layers above `layer` whose bounds fully contain it. */
  occludersOf(layer: Layer): Layer[] {
    const bounds = layer.bounds;
    if (isEmptyRect(bounds)) return [];
    return this.tree
      .search(bounds)
      .filter((item) => item.zOrder > layer.zOrder && containsRect(item, bounds))
      .map((item) => item.layer);
  }

  get size(): number {
    return this.tree.all().length;
  }

  clear(): void {
    this.tree.clear();
  }
}
