import { Bitmap } from "./bitmap";
import { stampPolyline } from "./rasterizer";
import { countRegions, fillEnclosed } from "./region-filler";

describe("fillEnclosed", () => {
  it("returns an empty region for an empty stroke buffer", () => {
    const result = fillEnclosed(Bitmap.empty(8, 6));

    expect(result.area).toBe(0);
    expect(result.regions).toBe(0);
    expect(result.mask.isEmpty()).toBe(true);
  });

  it("fills exactly the interior of a closed square, excluding the wall", () => {
    const walls = Bitmap.fromRows([
      ".......",
      ".#####.",
      ".#...#.",
      ".#...#.",
      ".#...#.",
      ".#####.",
      ".......",
    ]);
    const result = fillEnclosed(walls);

    expect(result.mask.toRows()).toEqual([
      ".......",
      ".......",
      "..###..",
      "..###..",
      "..###..",
      ".......",
      ".......",
    ]);
    expect(result.area).toBe(9);
    expect(result.regions).toBe(1);
  });

  it("leaks through a one-pixel gap", () => {
    const walls = Bitmap.fromRows([
      ".......",
      ".#####.",
      ".#...#.",
      ".#.....",
      ".#...#.",
      ".#####.",
      ".......",
    ]);
    const result = fillEnclosed(walls);

    expect(result.area).toBe(0);
    expect(result.mask.isEmpty()).toBe(true);
  });

  it("treats one-pixel diagonal walls as sealed", () => {
    const walls = Bitmap.fromRows([
      "...#...",
      "..#.#..",
      ".#...#.",
      "#.....#",
      ".#...#.",
      "..#.#..",
      "...#...",
    ]);
    const result = fillEnclosed(walls);

    expect(result.area).toBe(13);
    expect(result.regions).toBe(1);
  });

  it("fills a boundary drawn along the frame edge", () => {
    const walls = Bitmap.fromRows(["#####", "#...#", "#...#", "#...#", "#####"]);
    expect(fillEnclosed(walls).area).toBe(9);
  });

  it("counts separate enclosed regions", () => {
    const walls = Bitmap.fromRows(["###.###", "#.#.#.#", "###.###"]);
    const result = fillEnclosed(walls);

    expect(result.area).toBe(2);
    expect(result.regions).toBe(2);
  });

  it("is idempotent on an unchanged stroke buffer", () => {
    const walls = Bitmap.empty(40, 40);
    stampPolyline(
      walls,
      [
        { x: 5, y: 5 },
        { x: 30, y: 8 },
        { x: 25, y: 33 },
        { x: 8, y: 28 },
        { x: 5, y: 5 },
      ],
      1,
      1
    );

    const first = fillEnclosed(walls);
    const second = fillEnclosed(walls);
    expect(second.mask.equals(first.mask)).toBe(true);
    expect(first.area).toBeGreaterThan(0);
  });

  it("fills the interior of a rasterized circle", () => {
    const walls = Bitmap.empty(100, 100);
    const points = Array.from({ length: 65 }, (_, i) => {
      const angle = (i / 64) * Math.PI * 2;
      return { x: 50 + 20 * Math.cos(angle), y: 50 + 20 * Math.sin(angle) };
    });
    stampPolyline(walls, points, 2, 1);

    const result = fillEnclosed(walls);
    // Interior radius is about 20 - 2 = 18 pixels
    expect(result.area).toBeGreaterThan(Math.PI * 17 * 17);
    expect(result.area).toBeLessThan(Math.PI * 19 * 19);
    expect(result.regions).toBe(1);
    expect(result.mask.get(50, 50)).toBe(1);
    expect(result.mask.get(5, 5)).toBe(0);
  });

  it("never marks a wall pixel as region", () => {
    const walls = Bitmap.fromRows(["#####", "#.#.#", "#####"]);
    const { mask } = fillEnclosed(walls);
    for (let i = 0; i < walls.data.length; i++) {
      if (walls.data[i]) expect(mask.data[i]).toBe(0);
    }
  });
});

describe("countRegions", () => {
  it("does not join diagonal neighbours", () => {
    expect(countRegions(Bitmap.fromRows(["#.", ".#"]))).toBe(2);
  });
});
