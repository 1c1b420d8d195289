import { Bitmap } from "./bitmap";
import {
  blurMask,
  gaussianKernel,
  renderDisplay,
  renderOverlay,
  type OverlayStyle,
} from "./compositor";
import { DimensionMismatchError } from "./errors";
import type { RgbImage } from "./types";

const style: OverlayStyle = {
  color: [200, 0, 50],
  opacity: 0.5,
  strokeColor: [255, 0, 255],
  softenKernel: 1,
};

function gradientImage(width: number, height: number): RgbImage {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < data.length; i++) data[i] = (i * 7) % 256;
  return { width, height, data };
}

function pixel(image: RgbImage, x: number, y: number): number[] {
  const i = (y * image.width + x) * 3;
  return Array.from(image.data.subarray(i, i + 3));
}

describe("renderDisplay", () => {
  it("blends the region with the overlay color", () => {
    const frame = { width: 1, height: 1, data: new Uint8Array([100, 100, 100]) };
    const out = renderDisplay(frame, Bitmap.fromRows(["#"]), null, style);
    expect(Array.from(out.data)).toEqual([150, 50, 75]);
  });

  it("paints live strokes in the stroke color over the region", () => {
    const frame = { width: 2, height: 1, data: new Uint8Array([100, 100, 100, 100, 100, 100]) };
    const out = renderDisplay(frame, Bitmap.fromRows(["##"]), Bitmap.fromRows([".#"]), style);

    expect(pixel(out, 0, 0)).toEqual([150, 50, 75]);
    expect(pixel(out, 1, 0)).toEqual([255, 0, 255]);
  });

  it("passes the source through where there is no region or stroke", () => {
    const frame = gradientImage(6, 4);
    const out = renderDisplay(frame, Bitmap.empty(6, 4), Bitmap.empty(6, 4), style);
    expect(out.data).toEqual(frame.data);
  });

  it("leaves the source frame untouched", () => {
    const frame = gradientImage(3, 3);
    const before = frame.data.slice();
    renderDisplay(frame, Bitmap.fromRows(["###", "###", "###"]), null, style);
    expect(frame.data).toEqual(before);
  });

  it("rejects a mask of another size", () => {
    expect(() => renderDisplay(gradientImage(3, 3), Bitmap.empty(2, 2), null, style)).toThrow(
      DimensionMismatchError
    );
  });
});

describe("renderOverlay", () => {
  it("copies every pixel outside the region exactly", () => {
    const frame = gradientImage(7, 7);
    const mask = Bitmap.fromRows([
      ".......",
      ".......",
      "..###..",
      "..###..",
      "..###..",
      ".......",
      ".......",
    ]);
    const out = renderOverlay(frame, mask, { ...style, softenKernel: 5 });

    for (let y = 0; y < 7; y++) {
      for (let x = 0; x < 7; x++) {
        if (!mask.get(x, y)) expect(pixel(out, x, y)).toEqual(pixel(frame, x, y));
      }
    }
    expect(pixel(out, 3, 3)).not.toEqual(pixel(frame, 3, 3));
  });

  it("applies full opacity inside the region when softening is off", () => {
    const frame = { width: 2, height: 1, data: new Uint8Array([100, 100, 100, 100, 100, 100]) };
    const out = renderOverlay(frame, Bitmap.fromRows(["#."]), style);
    expect(Array.from(out.data)).toEqual([150, 50, 75, 100, 100, 100]);
  });

  it("fades the region in toward its edge", () => {
    const frame = { width: 41, height: 41, data: new Uint8Array(41 * 41 * 3) };
    const mask = Bitmap.empty(41, 41);
    for (let y = 11; y <= 29; y++) for (let x = 11; x <= 29; x++) mask.set(x, y, 1);

    const out = renderOverlay(frame, mask, {
      color: [200, 200, 200],
      opacity: 1,
      strokeColor: [0, 0, 0],
      softenKernel: 15,
    });

    const center = pixel(out, 20, 20)[0];
    const edge = pixel(out, 11, 20)[0];
    expect(center).toBe(200);
    expect(edge).toBeGreaterThan(0);
    expect(edge).toBeLessThan(center);
    expect(pixel(out, 10, 20)).toEqual([0, 0, 0]);
  });

  it("returns the source unchanged for an empty mask", () => {
    const frame = gradientImage(4, 4);
    expect(renderOverlay(frame, Bitmap.empty(4, 4), style).data).toEqual(frame.data);
  });
});

describe("gaussianKernel", () => {
  it("is normalized and symmetric", () => {
    const kernel = gaussianKernel(15);
    const sum = kernel.reduce((acc, w) => acc + w, 0);

    expect(kernel.length).toBe(15);
    expect(sum).toBeCloseTo(1, 10);
    expect(kernel[0]).toBeCloseTo(kernel[14], 12);
    expect(kernel[7]).toBeGreaterThan(kernel[6]);
  });

  it("rounds even sizes up to the next odd size", () => {
    expect(gaussianKernel(4).length).toBe(5);
    expect(Array.from(gaussianKernel(1))).toEqual([1]);
  });
});

describe("blurMask", () => {
  it("keeps a uniform mask uniform", () => {
    const mask = Bitmap.fromRows(["####", "####", "####"]);
    for (const value of blurMask(mask, 5)) expect(value).toBeCloseTo(1, 5);
  });
});
