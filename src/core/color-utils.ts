/**
 * Color Utility Functions
 *
 * HEX color parsing and per-channel alpha blending.
 */
import type { Rgb } from "./types";

export function hexToRgb(hex: string): [number, number, number] {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  return result
    ? [
        parseInt(result[1], 16),
        parseInt(result[2], 16),
        parseInt(result[3], 16),
      ]
    : [0, 0, 0];
}

export function isHexColor(value: string): boolean {
  return /^#?[a-f\d]{6}$/i.test(value);
}

/**
 * (1 - alpha) * source + alpha * color, rounded to the nearest byte
 */
export function blendChannel(source: number, color: number, alpha: number): number {
  return Math.round((1 - alpha) * source + alpha * color);
}

export function blendPixel(
  target: Uint8Array,
  offset: number,
  color: Rgb,
  alpha: number
) {
  target[offset] = blendChannel(target[offset], color[0], alpha);
  target[offset + 1] = blendChannel(target[offset + 1], color[1], alpha);
  target[offset + 2] = blendChannel(target[offset + 2], color[2], alpha);
}
