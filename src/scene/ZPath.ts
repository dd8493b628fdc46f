/**
 * Hierarchical paint-order address.
 *
 * A ZPath is the sequence of local z-orders from the root down to a node:
 *   window 0              → [0]
 *   window 0, background  → [0, 0]
 *   window 0, first cast  → [0, 1]
 *
 * Ordering is lexicographic with a strict prefix sorting first, which is a
 * pre-order traversal of the tree: a parent paints before its descendants,
 * siblings paint in local z-order.
 */
export class ZPath {
  private readonly path: readonly number[];

  private constructor(path: readonly number[]) {
    this.path = path;
  }

  static of(...segments: number[]): ZPath {
    return new ZPath([...segments]);
  }

  /** `parent` extended by `localZOrder`. A missing parent yields `[localZOrder]`. */
  static fromParent(parent: ZPath | undefined, localZOrder: number): ZPath {
    if (!parent) return new ZPath([localZOrder]);
    return new ZPath([...parent.path, localZOrder]);
  }

  /** Copy of the segments. */
  segments(): number[] {
    return [...this.path];
  }

  get depth(): number {
    return this.path.length;
  }

  /** Last segment, or 0 for an empty path. */
  get localZOrder(): number {
    return this.path.length === 0 ? 0 : this.path[this.path.length - 1];
  }

  /** Path with the last segment dropped; undefined at depth ≤ 1. */
  parent(): ZPath | undefined {
    if (this.path.length <= 1) return undefined;
    return new ZPath(this.path.slice(0, -1));
  }

  /** Same prefix, different last segment. */
  withLocalZOrder(localZOrder: number): ZPath {
    if (this.path.length === 0) return new ZPath([localZOrder]);
    return new ZPath([...this.path.slice(0, -1), localZOrder]);
  }

  compare(other: ZPath): -1 | 0 | 1 {
    const a = this.path;
    const b = other.path;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      if (a[i] < b[i]) return -1;
      if (a[i] > b[i]) return 1;
    }
    if (a.length < b.length) return -1;
    if (a.length > b.length) return 1;
    return 0;
  }

  less(other: ZPath): boolean {
    return this.compare(other) < 0;
  }

  equals(other: ZPath | undefined): boolean {
    return other !== undefined && this.compare(other) === 0;
  }

  /** True if this path is a prefix of `other` (every path is a prefix of itself). */
  isPrefix(other: ZPath): boolean {
    if (this.path.length > other.path.length) return false;
    for (let i = 0; i < this.path.length; i++) {
      if (this.path[i] !== other.path[i]) return false;
    }
    return true;
  }

  toString(): string {
    return `[${this.path.join(" ")}]`;
  }
}

/** Comparator where a missing path sorts before any present one. */
export function compareZPaths(a: ZPath | undefined, b: ZPath | undefined): number {
  if (!a && !b) return 0;
  if (!a) return -1;
  if (!b) return 1;
  return a.compare(b);
}
