/**
 * Canvas State - Per-Frame Drawing Surface
 *
 * Owns the mutable buffers of the active frame:
 * - strokeBuffer: boundary pixels drawn by the operator
 * - regionMask: the filled region, written only by fill() or reset
 *
 * Key responsibilities:
 * - Binds a frame and sizes both buffers to it
 * - Applies draw/erase segments through the rasterizer
 * - Triggers the region filler on demand
 * - Clamps pointer coordinates to the frame; never rejects input
 */
import { Bitmap } from "./bitmap";
import type { BrushState } from "./brush";
import { renderDisplay, type OverlayStyle } from "./compositor";
import { stampSegment } from "./rasterizer";
import { fillEnclosed, type FillResult } from "./region-filler";
import type { BrushMode, Frame, Point, RgbImage } from "./types";

export class CanvasState {
  private frame: Frame | null = null;
  private strokes = Bitmap.empty(0, 0);
  private region = Bitmap.empty(0, 0);

  get boundFrame(): Frame | null {
    return this.frame;
  }

  get strokeBuffer(): Bitmap {
    return this.strokes;
  }

  get regionMask(): Bitmap {
    return this.region;
  }

  beginFrame(frame: Frame) {
    this.frame = frame;
    this.strokes = Bitmap.empty(frame.width, frame.height);
    this.region = Bitmap.empty(frame.width, frame.height);
  }

  /**
   * Drop the bound frame and its buffers (used on quit)
   */
  release() {
    this.frame = null;
    this.strokes = Bitmap.empty(0, 0);
    this.region = Bitmap.empty(0, 0);
  }

  // ============================================================
  // Stroke Editing
  // ============================================================

  /**
   * Stamp a segment in the given mode. `prev` is null on the first sample of a
   * drag, which stamps a disk at `curr`.
   * @returns number of stroke pixels changed
   */
  stroke(prev: Point | null, curr: Point, brush: BrushState, mode: BrushMode = brush.mode): number {
    if (!this.frame) return 0;

    const to = this.clampPoint(curr);
    const from = prev ? this.clampPoint(prev) : to;
    return stampSegment(this.strokes, from, to, brush.radiusFor(mode), mode === "draw" ? 1 : 0);
  }

  draw(prev: Point | null, curr: Point, brush: BrushState): number {
    return this.stroke(prev, curr, brush, "draw");
  }

  erase(prev: Point | null, curr: Point, brush: BrushState): number {
    return this.stroke(prev, curr, brush, "erase");
  }

  clear() {
    this.strokes.reset();
    this.region.reset();
  }

  /**
   * Recompute the region from the current strokes, replacing the old one
   */
  fill(): FillResult {
    const result = fillEnclosed(this.strokes);
    this.region = result.mask;
    return result;
  }

  render(style: OverlayStyle): RgbImage | null {
    if (!this.frame) return null;
    return renderDisplay(this.frame, this.region, this.strokes, style);
  }

  // ============================================================
  // Utility Methods
  // ============================================================

  private clampPoint(point: Point): Point {
    const frame = this.frame;
    if (!frame) return point;
    return {
      x: Math.max(0, Math.min(frame.width - 1, Math.round(point.x))),
      y: Math.max(0, Math.min(frame.height - 1, Math.round(point.y))),
    };
  }
}
