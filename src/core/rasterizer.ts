/**
 * Stroke Rasterizer
 *
 * Turns consecutive pointer samples into covered pixels of a Bitmap.
 * Each segment is stamped as a capsule: every pixel whose center lies within
 * `radius` of the segment. A zero-length segment degenerates to a disk, so a
 * click without a drag still leaves a mark.
 *
 * Fast drags produce widely spaced samples; the capsule covers the whole gap
 * between them, so the stroke stays connected at any pointer speed.
 */
import type { Bitmap } from "./bitmap";
import type { Point } from "./types";

/**
 * Stamp a thick segment into `target`.
 * value 1 ORs the capsule in (draw), value 0 clears it (erase).
 * @returns number of pixels whose value changed
 */
export function stampSegment(
  target: Bitmap,
  from: Point,
  to: Point,
  radius: number,
  value: 0 | 1
): number {
  const { width, height, data } = target;
  if (width === 0 || height === 0 || radius < 0) return 0;

  const minX = Math.max(0, Math.floor(Math.min(from.x, to.x) - radius));
  const maxX = Math.min(width - 1, Math.ceil(Math.max(from.x, to.x) + radius));
  const minY = Math.max(0, Math.floor(Math.min(from.y, to.y) - radius));
  const maxY = Math.min(height - 1, Math.ceil(Math.max(from.y, to.y) + radius));

  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const lengthSq = dx * dx + dy * dy;
  const radiusSq = radius * radius;

  let changed = 0;
  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      // Project onto the segment, clamped to its endpoints
      let t = lengthSq === 0 ? 0 : ((x - from.x) * dx + (y - from.y) * dy) / lengthSq;
      t = Math.max(0, Math.min(1, t));
      const cx = from.x + dx * t - x;
      const cy = from.y + dy * t - y;
      if (cx * cx + cy * cy > radiusSq) continue;

      const i = y * width + x;
      if (data[i] !== value) {
        data[i] = value;
        changed++;
      }
    }
  }
  return changed;
}

/**
 * Stamp a single disk, used for a press without movement
 */
export function stampDisk(target: Bitmap, center: Point, radius: number, value: 0 | 1): number {
  return stampSegment(target, center, center, radius, value);
}

/**
 * Stamp a polyline sample by sample, the way a drag arrives
 */
export function stampPolyline(
  target: Bitmap,
  points: readonly Point[],
  radius: number,
  value: 0 | 1
): number {
  if (points.length === 0) return 0;
  let changed = stampDisk(target, points[0], radius, value);
  for (let i = 1; i < points.length; i++) {
    changed += stampSegment(target, points[i - 1], points[i], radius, value);
  }
  return changed;
}
