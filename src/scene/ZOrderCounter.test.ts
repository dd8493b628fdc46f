import { ZOrderCounter, ROOT_SCOPE } from "./ZOrderCounter";

describe("ZOrderCounter", () => {
  it("should count each scope from 0 independently", () => {
    const counter = new ZOrderCounter();
    expect(counter.getNext(ROOT_SCOPE)).toBe(0);
    expect(counter.getNext(ROOT_SCOPE)).toBe(1);
    expect(counter.getNext(7)).toBe(0);
    expect(counter.getNext(ROOT_SCOPE)).toBe(2);
    expect(counter.getNext(7)).toBe(1);
  });

  it("should peek without advancing", () => {
    const counter = new ZOrderCounter();
    counter.getNext(3);
    expect(counter.peek(3)).toBe(1);
    expect(counter.peek(3)).toBe(1);
    expect(counter.peek(4)).toBe(0);
  });

  it("should reserve values above a given one without moving backwards", () => {
    const counter = new ZOrderCounter();
    counter.reserveAbove(1, 5);
    expect(counter.getNext(1)).toBe(6);
    counter.reserveAbove(1, 2);
    expect(counter.getNext(1)).toBe(7);
  });

  it("should not offer a way to move a scope backwards", () => {
    const counter = new ZOrderCounter();
    counter.getNext(1);
    expect("reset" in counter).toBe(false);
    expect("resetAll" in counter).toBe(false);
    expect(counter.getNext(1)).toBe(1);
  });
});
