import { Bitmap } from "./bitmap";
import { stampDisk, stampPolyline, stampSegment } from "./rasterizer";
import { countRegions } from "./region-filler";

describe("stampDisk", () => {
  it("stamps a plus shape at radius 1", () => {
    const target = Bitmap.empty(5, 5);
    expect(stampDisk(target, { x: 2, y: 2 }, 1, 1)).toBe(5);
    expect(target.toRows()).toEqual([".....", "..#..", ".###.", "..#..", "....."]);
  });

  it("covers every pixel within the radius", () => {
    const target = Bitmap.empty(9, 9);
    expect(stampDisk(target, { x: 4, y: 4 }, 2, 1)).toBe(13);
    expect(stampDisk(Bitmap.empty(9, 9), { x: 4, y: 4 }, 3, 1)).toBe(29);
  });

  it("clips at the bitmap edge", () => {
    const target = Bitmap.empty(3, 3);
    expect(stampDisk(target, { x: 0, y: 0 }, 1, 1)).toBe(3);
    expect(target.toRows()).toEqual(["##.", "#..", "..."]);
  });

  it("reports only pixels that changed", () => {
    const target = Bitmap.empty(5, 5);
    stampDisk(target, { x: 2, y: 2 }, 1, 1);
    expect(stampDisk(target, { x: 2, y: 2 }, 1, 1)).toBe(0);
  });
});

describe("stampSegment", () => {
  it("draws a one-pixel line at radius 0", () => {
    const target = Bitmap.empty(7, 5);
    expect(stampSegment(target, { x: 1, y: 2 }, { x: 5, y: 2 }, 0, 1)).toBe(5);
    expect(target.toRows()[2]).toBe(".#####.");
  });

  it("bridges widely spaced samples into one connected band", () => {
    const target = Bitmap.empty(20, 3);
    stampSegment(target, { x: 0, y: 0 }, { x: 19, y: 0 }, 1, 1);

    expect(target.count()).toBe(40);
    expect(target.toRows()[2]).toBe("....................");
    expect(countRegions(target)).toBe(1);
  });

  it("clears pixels with value 0", () => {
    const target = Bitmap.empty(10, 10);
    const drawn = stampSegment(target, { x: 2, y: 2 }, { x: 7, y: 6 }, 2, 1);
    const erased = stampSegment(target, { x: 2, y: 2 }, { x: 7, y: 6 }, 2, 0);

    expect(erased).toBe(drawn);
    expect(target.isEmpty()).toBe(true);
  });
});

describe("stampPolyline", () => {
  it("stamps the first sample even without movement", () => {
    const target = Bitmap.empty(5, 5);
    stampPolyline(target, [{ x: 2, y: 2 }], 1, 1);
    expect(target.count()).toBe(5);
  });

  it("does nothing for an empty polyline", () => {
    const target = Bitmap.empty(5, 5);
    expect(stampPolyline(target, [], 1, 1)).toBe(0);
  });
});
