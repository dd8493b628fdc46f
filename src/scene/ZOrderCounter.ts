/** Scope key for nodes without a parent. Node ids start at 1. */
export const ROOT_SCOPE = 0;

/**
 * Per-scope monotonic allocator of local z-orders.
 * A scope is usually a parent node id; each scope starts at 0 and never
 * moves backwards.
 */
export class ZOrderCounter {
  private counters = new Map<number, number>();

  /** Return the next value for `scope` and advance it. */
  getNext(scope: number): number {
    const current = this.counters.get(scope) ?? 0;
    this.counters.set(scope, current + 1);
    return current;
  }

  /** Value the next `getNext(scope)` would return, without advancing. */
  peek(scope: number): number {
    return this.counters.get(scope) ?? 0;
  }

  /**
   * Ensure the next value for `scope` is strictly greater than `value`.
   * Never moves a counter backwards.
   */
  reserveAbove(scope: number, value: number): void {
    if (this.peek(scope) <= value) {
      this.counters.set(scope, value + 1);
    }
  }
}
