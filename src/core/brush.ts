/**
 * Brush State
 *
 * Session-wide brush preference: radius and active mode.
 * Created once per session and handed by reference to the rasterizer,
 * so a radius picked on one frame sticks for the next.
 *
 * Radius requests outside [min, max] are clamped, never rejected.
 */
import type { BrushMode } from "./types";

export interface RangeSetting {
  min: number;
  max: number;
  step: number;
  default: number;
}

export interface BrushSettings {
  radius: RangeSetting;
  /** Eraser radius = brush radius * eraseScale */
  eraseScale: number;
}

export const defaultBrushSettings: BrushSettings = {
  radius: { min: 1, max: 20, step: 1, default: 3 },
  eraseScale: 2,
};

export class BrushState {
  readonly settings: BrushSettings;
  private currentRadius: number;
  private currentMode: BrushMode = "draw";

  constructor(settings: BrushSettings = defaultBrushSettings) {
    this.settings = settings;
    this.currentRadius = this.clamp(settings.radius.default);
  }

  get radius(): number {
    return this.currentRadius;
  }

  get mode(): BrushMode {
    return this.currentMode;
  }

  setMode(mode: BrushMode) {
    this.currentMode = mode;
  }

  /**
   * @returns the radius actually applied
   */
  setRadius(radius: number): number {
    this.currentRadius = this.clamp(radius);
    return this.currentRadius;
  }

  /**
   * Grow (positive steps) or shrink (negative steps) by the configured step
   */
  resize(steps: number): number {
    return this.setRadius(this.currentRadius + steps * this.settings.radius.step);
  }

  /**
   * Stamp radius for a given mode; the eraser is wider than the pen
   */
  radiusFor(mode: BrushMode = this.currentMode): number {
    return mode === "erase" ? this.currentRadius * this.settings.eraseScale : this.currentRadius;
  }

  private clamp(radius: number): number {
    const { min, max } = this.settings.radius;
    const rounded = Number.isFinite(radius) ? Math.round(radius) : min;
    return Math.max(min, Math.min(max, rounded));
  }
}
