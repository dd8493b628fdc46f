import type { Bitmap, BitmapFactory } from "../render/Bitmap";
import { NotFoundError } from "../errors";
import { SceneNode } from "./SceneNode";
import { ZOrderCounter, ROOT_SCOPE } from "./ZOrderCounter";
import { ZPath } from "./ZPath";

export type DebugDrawCallback = (surface: Bitmap, node: SceneNode, x: number, y: number) => void;

/** Serializable view of a node, as produced by `dumpState()`. */
export interface SceneNodeState {
  id: number;
  zPath: number[] | null;
  position: [number, number];
  size: [number, number];
  visible: boolean;
  effectivelyVisible: boolean;
  alpha: number;
  parentId?: number;
  children?: SceneNodeState[];
}

export interface SceneGraphState {
  totalSprites: number;
  sprites: SceneNodeState[];
}

/**
 * Owns every SceneNode and produces the cached paint order.
 *
 * Nodes carrying a ZPath are ordered by it. Nodes without one are legacy
 * sprites: they paint before every ZPath-bearing node, in id order.
 */
export class SceneGraph {
  private nodes = new Map<number, SceneNode>();
  private nextId = 1;
  private sorted: SceneNode[] = [];
  private needSort = true;
  private zOrderCounter = new ZOrderCounter();
  private debugDrawCallback: DebugDrawCallback | undefined;
  private factory: BitmapFactory | undefined;

  private readonly invalidateOrder = (): void => {
    this.needSort = true;
  };

  constructor(factory?: BitmapFactory) {
    this.factory = factory;
  }

  // --- Creation ---

  createSprite(image?: Bitmap): SceneNode {
    return this.register(image);
  }

  /**
   * Create a sprite that starts hidden. Finish its ZPath and parent before
   * calling `setVisible(true)` so no draw pass sees it half-built.
   */
  createSpriteHidden(image?: Bitmap): SceneNode {
    const node = this.register(image);
    node.setVisible(false);
    return node;
  }

  /** Sprite with a fresh bitmap. Non-positive sizes, or no factory, yield undefined. */
  createSpriteWithSize(width: number, height: number): SceneNode | undefined {
    if (width <= 0 || height <= 0 || !this.factory) return undefined;
    return this.register(this.factory.create(width, height));
  }

  /** Root sprite whose ZPath is exactly `[windowZOrder]`. */
  createRootSprite(image: Bitmap | undefined, windowZOrder: number): SceneNode {
    const node = this.register(image);
    node.setZPath(ZPath.of(windowZOrder));
    return node;
  }

  /**
   * Sprite whose local z-order comes from its parent's scope, so later
   * siblings always paint above earlier ones.
   */
  createSpriteWithZPath(image: Bitmap | undefined, parent?: SceneNode | null): SceneNode {
    const node = this.register(image);
    const owner = parent && this.nodes.get(parent.id) === parent ? parent : null;
    if (owner) owner.addChild(node);
    const local = this.zOrderCounter.getNext(owner ? owner.id : ROOT_SCOPE);
    node.setZPath(ZPath.fromParent(owner?.zPath, local));
    return node;
  }

  private register(image: Bitmap | undefined): SceneNode {
    const node = new SceneNode(this.nextId++, image, this.invalidateOrder);
    this.nodes.set(node.id, node);
    this.needSort = true;
    return node;
  }

  // --- Registry ---

  getSprite(id: number): SceneNode | undefined {
    return this.nodes.get(id);
  }

  /** Remove a node and its whole subtree. Unknown ids are ignored. */
  removeSprite(id: number): void {
    const node = this.nodes.get(id);
    if (!node) return;
    node.parent?.removeChild(id);
    this.removeSubtree(node);
    this.needSort = true;
  }

  private removeSubtree(node: SceneNode): void {
    for (const child of node.children) {
      node.removeChild(child.id);
      this.removeSubtree(child);
    }
    this.nodes.delete(node.id);
  }

  /**
   * Drop every node. Ids and z-order counters keep counting: nothing resets
   * a counter, so siblings never share a local z-order.
   */
  clear(): void {
    this.nodes.clear();
    this.sorted = [];
    this.needSort = true;
  }

  count(): number {
    return this.nodes.size;
  }

  markNeedSort(): void {
    this.needSort = true;
  }

  setDebugDrawCallback(callback: DebugDrawCallback | undefined): void {
    this.debugDrawCallback = callback;
  }

  // --- Ordering ---

  /** Nodes in paint order (cached until the next structural change). */
  drawOrder(): readonly SceneNode[] {
    if (this.needSort) this.sortNodes();
    return this.sorted;
  }

  private sortNodes(): void {
    // Map iteration is id order, and sort is stable
    this.sorted = [...this.nodes.values()].sort(compareNodes);
    this.needSort = false;
  }

  /**
   * Give `id` a local z-order above every current sibling and rewrite the
   * ZPaths of its descendants to the new prefix.
   */
  bringToFront(id: number): void {
    const node = this.nodes.get(id);
    if (!node) throw new NotFoundError("sprite", id);

    const scope = node.parent ? node.parent.id : ROOT_SCOPE;
    let maxSibling: number | undefined;
    for (const sibling of this.siblingsOf(node)) {
      const z = sibling.zPath?.localZOrder;
      if (z !== undefined && (maxSibling === undefined || z > maxSibling)) maxSibling = z;
    }
    if (maxSibling !== undefined) this.zOrderCounter.reserveAbove(scope, maxSibling);

    this.relocate(node, this.zOrderCounter.getNext(scope));
  }

  /** Give `id` a local z-order below every current sibling (may go negative). */
  sendToBack(id: number): void {
    const node = this.nodes.get(id);
    if (!node) throw new NotFoundError("sprite", id);

    let minSibling: number | undefined;
    for (const sibling of this.siblingsOf(node)) {
      const z = sibling.zPath?.localZOrder;
      if (z !== undefined && (minSibling === undefined || z < minSibling)) minSibling = z;
    }

    this.relocate(node, (minSibling ?? 0) - 1);
  }

  private siblingsOf(node: SceneNode): SceneNode[] {
    if (node.parent) return node.parent.children.filter((c) => c !== node);
    const roots: SceneNode[] = [];
    for (const other of this.nodes.values()) {
      if (other !== node && other.parent === null) roots.push(other);
    }
    return roots;
  }

  private relocate(node: SceneNode, localZOrder: number): void {
    node.setZPath(ZPath.fromParent(node.parent?.zPath, localZOrder));
    this.updateChildrenZPaths(node);
    this.needSort = true;
  }

  /** Re-prefix every descendant's ZPath, keeping each one's local z-order. */
  updateChildrenZPaths(parent: SceneNode): void {
    for (const child of parent.children) {
      if (!child.zPath) continue;
      child.setZPath(ZPath.fromParent(parent.zPath, child.zPath.localZOrder));
      this.updateChildrenZPaths(child);
    }
  }

  // --- Drawing ---

  /** Paint every effectively visible node onto `surface` in paint order. */
  draw(surface: Bitmap): void {
    for (const node of this.drawOrder()) {
      if (!node.isEffectivelyVisible()) continue;
      const custom = node.customDraw;
      const image = node.image;
      if (!custom && !image) continue;

      const { x, y } = node.absolutePosition();
      const alpha = node.effectiveAlpha();
      if (custom) {
        custom(surface, x, y, alpha);
      } else if (image) {
        surface.drawImage(image, x, y, alpha);
      }
      this.debugDrawCallback?.(surface, node, x, y);
    }
  }

  // --- Diagnostics ---

  /** Indented tree of every root and its descendants, siblings in z-order. */
  printHierarchy(): string {
    const lines: string[] = [];
    const walk = (node: SceneNode, depth: number): void => {
      const visibility = node.visible ? "visible" : "hidden";
      lines.push(`${"  ".repeat(depth)}- Sprite ${node.id}: ${zPathString(node)} (${visibility})`);
      for (const child of sortedByZPath(node.children)) walk(child, depth + 1);
    };
    for (const root of this.roots()) walk(root, 0);
    return lines.map((l) => `${l}\n`).join("");
  }

  printDrawOrder(): string {
    const lines = ["Draw Order:"];
    this.drawOrder().forEach((node, i) => {
      const visibility = node.visible ? "visible" : "hidden";
      lines.push(`  ${i + 1}. Sprite ${node.id}: ${zPathString(node)} (${visibility})`);
    });
    return lines.map((l) => `${l}\n`).join("");
  }

  dumpState(): SceneGraphState {
    return {
      totalSprites: this.nodes.size,
      sprites: this.roots().map(nodeState),
    };
  }

  private roots(): SceneNode[] {
    return sortedByZPath([...this.nodes.values()].filter((n) => n.parent === null));
  }
}

function compareNodes(a: SceneNode, b: SceneNode): number {
  if (a.zPath && b.zPath) return a.zPath.compare(b.zPath);
  if (!a.zPath && b.zPath) return -1;
  if (a.zPath && !b.zPath) return 1;
  return a.id - b.id;
}

function sortedByZPath(nodes: readonly SceneNode[]): SceneNode[] {
  return [...nodes].sort(compareNodes);
}

function zPathString(node: SceneNode): string {
  return node.zPath ? node.zPath.toString() : "nil";
}

function nodeState(node: SceneNode): SceneNodeState {
  const { x, y } = node.position;
  const { width, height } = node.size();
  const state: SceneNodeState = {
    id: node.id,
    zPath: node.zPath ? node.zPath.segments() : null,
    position: [x, y],
    size: [width, height],
    visible: node.visible,
    effectivelyVisible: node.isEffectivelyVisible(),
    alpha: node.alpha,
  };
  if (node.parent) state.parentId = node.parent.id;
  if (node.hasChildren()) state.children = node.children.map(nodeState);
  return state;
}
