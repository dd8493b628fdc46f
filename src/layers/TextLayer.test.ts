import { TextLayer } from "./TextLayer";
import { RecordingBitmap } from "../__tests__/RecordingBitmap";

describe("TextLayer", () => {
  it("should take its bounds from the rendered image", () => {
    const layer = new TextLayer(1, 0, 10, 10, "hello", new RecordingBitmap(40, 10));
    expect(layer.kind).toBe("text");
    expect(layer.bounds).toEqual({ minX: 10, minY: 10, maxX: 50, maxY: 20 });
    expect(layer.dirty).toBe(false);
  });

  it("should start dirty and empty without an image", () => {
    const layer = new TextLayer(1, 0, 10, 10, "hello");
    expect(layer.dirty).toBe(true);
    expect(layer.bounds).toEqual({ minX: 0, minY: 0, maxX: 0, maxY: 0 });
    expect(layer.size).toEqual({ width: 0, height: 0 });
  });

  it("should become clean once the image is installed", () => {
    const layer = new TextLayer(1, 0, 3, 4, "hi");
    layer.setImage(new RecordingBitmap(12, 8));
    expect(layer.dirty).toBe(false);
    expect(layer.hasImage()).toBe(true);
    expect(layer.bounds).toEqual({ minX: 3, minY: 4, maxX: 15, maxY: 12 });
  });

  it("should drop the image when the text changes", () => {
    const layer = new TextLayer(1, 0, 0, 0, "a", new RecordingBitmap(5, 5));
    layer.setText("a");
    expect(layer.hasImage()).toBe(true);

    layer.setText("b");
    expect(layer.text).toBe("b");
    expect(layer.hasImage()).toBe(false);
    expect(layer.dirty).toBe(true);
  });

  it("should move with its image", () => {
    const layer = new TextLayer(1, 0, 0, 0, "a", new RecordingBitmap(5, 5));
    layer.setPosition(7, 8);
    expect(layer.position).toEqual({ x: 7, y: 8 });
    expect(layer.bounds).toEqual({ minX: 7, minY: 8, maxX: 12, maxY: 13 });
    expect(layer.dirty).toBe(true);
  });

  it("should mirror the text record", () => {
    const layer = new TextLayer(1, 0, 0, 0, "a", new RecordingBitmap(5, 5));
    layer.updateFromText({ x: 1, y: 2, text: "a", visible: false });
    expect(layer.position).toEqual({ x: 1, y: 2 });
    expect(layer.hasImage()).toBe(true);
    expect(layer.visible).toBe(false);

    layer.updateFromText({ x: 1, y: 2, text: "a" });
    expect(layer.visible).toBe(false);
  });
});
