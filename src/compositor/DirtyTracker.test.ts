import { DirtyTracker } from "./DirtyTracker";
import { containsRect, rect, unionRect } from "../geometry/Rect";
import type { Rect } from "../types";

const unionCases: [string, Rect, Rect][] = [
  ["overlapping", rect(0, 0, 10, 10), rect(5, 5, 10, 10)],
  ["adjacent", rect(0, 0, 10, 10), rect(10, 0, 10, 10)],
  ["disjoint", rect(0, 0, 10, 10), rect(40, 50, 5, 5)],
];

describe("DirtyTracker", () => {
  it("should start fully dirty with an empty region", () => {
    const tracker = new DirtyTracker();
    expect(tracker.fullDirty).toBe(true);
    expect(tracker.isDirty()).toBe(true);
    expect(tracker.dirtyRegion).toEqual({ minX: 0, minY: 0, maxX: 0, maxY: 0 });
  });

  it("should be clean after clear", () => {
    const tracker = new DirtyTracker();
    tracker.addRegion(rect(0, 0, 10, 10));
    tracker.clear();
    expect(tracker.isDirty()).toBe(false);
    expect(tracker.fullDirty).toBe(false);
  });

  it.each(unionCases)("should accumulate the union of %s rectangles", (_name, r1, r2) => {
    const tracker = new DirtyTracker();
    tracker.clear();
    tracker.addRegion(r1);
    tracker.addRegion(r2);

    const region = tracker.dirtyRegion;
    expect(region).toEqual(unionRect(r1, r2));
    expect(containsRect(region, r1)).toBe(true);
    expect(containsRect(region, r2)).toBe(true);
    expect(tracker.isDirty()).toBe(true);
    expect(tracker.fullDirty).toBe(false);
  });

  it("should ignore empty rectangles", () => {
    const tracker = new DirtyTracker();
    tracker.clear();
    tracker.addRegion(rect(3, 3, 0, 0));
    expect(tracker.isDirty()).toBe(false);
  });

  it("should start a fresh region at a point away from the origin", () => {
    const tracker = new DirtyTracker();
    tracker.addRegion(rect(20, 30, 5, 5));
    expect(tracker.dirtyRegion).toEqual({ minX: 20, minY: 30, maxX: 25, maxY: 35 });
  });
});
