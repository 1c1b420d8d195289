/**
 * Region Filler
 *
 * Converts a stroke outline into a solid region. Stroke pixels are walls;
 * everything reachable from the frame border without crossing a wall is
 * exterior. The region is what remains: neither exterior nor wall.
 *
 * Flood fill is 4-connected, so a one-pixel diagonal line still seals.
 * A boundary with a real gap leaks and yields an empty (or partial) region.
 *
 * The work-list is a preallocated Int32Array: each pixel is marked when it is
 * pushed, so it is pushed at most once and the list never outgrows W*H.
 */
import { Bitmap } from "./bitmap";

export interface FillResult {
  mask: Bitmap;
  /** Foreground pixel count */
  area: number;
  /** Number of separate 4-connected enclosed regions */
  regions: number;
}

/**
 * Spread from the seeds already on `stack` through `open` cells,
 * marking every reached cell in `visited`.
 */
function spread(
  width: number,
  height: number,
  open: Uint8Array,
  visited: Uint8Array,
  stack: Int32Array,
  top: number
) {
  const push = (i: number) => {
    if (open[i] && !visited[i]) {
      visited[i] = 1;
      stack[top++] = i;
    }
  };

  while (top > 0) {
    const i = stack[--top];
    const x = i % width;
    if (x > 0) push(i - 1);
    if (x < width - 1) push(i + 1);
    if (i >= width) push(i - width);
    if (i < width * (height - 1)) push(i + width);
  }
}

export function fillEnclosed(walls: Bitmap): FillResult {
  const { width, height } = walls;
  const size = width * height;
  const mask = new Bitmap(width, height);
  if (size === 0) return { mask, area: 0, regions: 0 };

  const open = new Uint8Array(size);
  for (let i = 0; i < size; i++) open[i] = walls.data[i] ? 0 : 1;

  const exterior = new Uint8Array(size);
  const stack = new Int32Array(size);
  let top = 0;

  // Seed from every open border pixel
  const seed = (i: number) => {
    if (open[i] && !exterior[i]) {
      exterior[i] = 1;
      stack[top++] = i;
    }
  };
  for (let x = 0; x < width; x++) {
    seed(x);
    seed((height - 1) * width + x);
  }
  for (let y = 1; y < height - 1; y++) {
    seed(y * width);
    seed(y * width + width - 1);
  }
  spread(width, height, open, exterior, stack, top);

  let area = 0;
  for (let i = 0; i < size; i++) {
    if (open[i] && !exterior[i]) {
      mask.data[i] = 1;
      area++;
    }
  }

  return { mask, area, regions: countRegions(mask) };
}

/**
 * Count 4-connected components of set pixels
 */
export function countRegions(bitmap: Bitmap): number {
  const { width, height, data } = bitmap;
  const visited = new Uint8Array(data.length);
  const stack = new Int32Array(data.length);
  let regions = 0;

  for (let i = 0; i < data.length; i++) {
    if (!data[i] || visited[i]) continue;
    regions++;
    visited[i] = 1;
    stack[0] = i;
    spread(width, height, data, visited, stack, 1);
  }
  return regions;
}
