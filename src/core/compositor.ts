/**
 * Overlay Compositor
 *
 * Renders the region mask over the source frame.
 *
 * Two outputs:
 * - renderDisplay: on-screen feedback. Hard translucent fill over the region,
 *   live stroke pixels painted on top in the outline color so a boundary in
 *   progress reads differently from a filled region.
 * - renderOverlay: the saved artifact. Region only, no strokes; the region's
 *   inner edge fades in through a Gaussian-blurred copy of the mask.
 *
 * Pixels outside the region are copied from the source unchanged in both.
 */
import type { Bitmap } from "./bitmap";
import { blendPixel } from "./color-utils";
import { DimensionMismatchError } from "./errors";
import type { Rgb, RgbImage } from "./types";

export interface OverlayStyle {
  color: Rgb;
  opacity: number;
  strokeColor: Rgb;
  /** Odd Gaussian kernel size used to soften the saved overlay's edge; 1 disables */
  softenKernel: number;
}

export const defaultOverlayStyle: OverlayStyle = {
  color: [135, 206, 250],
  opacity: 0.45,
  strokeColor: [255, 64, 64],
  softenKernel: 15,
};

function assertSameSize(image: RgbImage, layer: Bitmap) {
  if (!layer.sameSize(image)) {
    throw new DimensionMismatchError(image, layer);
  }
}

export function renderDisplay(
  frame: RgbImage,
  mask: Bitmap,
  strokes: Bitmap | null,
  style: OverlayStyle = defaultOverlayStyle
): RgbImage {
  assertSameSize(frame, mask);
  if (strokes) assertSameSize(frame, strokes);

  const data = frame.data.slice();
  for (let i = 0; i < mask.data.length; i++) {
    if (mask.data[i]) blendPixel(data, i * 3, style.color, style.opacity);
  }

  if (strokes) {
    const [r, g, b] = style.strokeColor;
    for (let i = 0; i < strokes.data.length; i++) {
      if (!strokes.data[i]) continue;
      data[i * 3] = r;
      data[i * 3 + 1] = g;
      data[i * 3 + 2] = b;
    }
  }

  return { width: frame.width, height: frame.height, data };
}

export function renderOverlay(
  frame: RgbImage,
  mask: Bitmap,
  style: OverlayStyle = defaultOverlayStyle
): RgbImage {
  assertSameSize(frame, mask);

  const data = frame.data.slice();
  if (mask.isEmpty()) return { width: frame.width, height: frame.height, data };

  const soft = blurMask(mask, style.softenKernel);
  for (let i = 0; i < mask.data.length; i++) {
    if (!mask.data[i]) continue;
    blendPixel(data, i * 3, style.color, style.opacity * Math.min(1, soft[i]));
  }

  return { width: frame.width, height: frame.height, data };
}

// ============================================================
// Gaussian Softening
// ============================================================

/**
 * Normalized 1D Gaussian weights. Sigma follows the usual rule for a kernel
 * given only by its size: 0.3 * ((size - 1) / 2 - 1) + 0.8
 */
export function gaussianKernel(size: number): Float64Array {
  const n = Math.max(1, Math.floor(size) | 1);
  const sigma = 0.3 * ((n - 1) * 0.5 - 1) + 0.8;
  const half = (n - 1) / 2;
  const kernel = new Float64Array(n);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const d = i - half;
    kernel[i] = Math.exp(-(d * d) / (2 * sigma * sigma));
    sum += kernel[i];
  }
  for (let i = 0; i < n; i++) kernel[i] /= sum;
  return kernel;
}

/**
 * Separable blur of a binary mask into [0, 1] weights; borders replicate
 */
export function blurMask(mask: Bitmap, kernelSize: number): Float32Array {
  const { width, height, data } = mask;
  const kernel = gaussianKernel(kernelSize);
  const half = (kernel.length - 1) / 2;

  const horizontal = new Float32Array(data.length);
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        const sx = Math.max(0, Math.min(width - 1, x + k - half));
        acc += kernel[k] * data[row + sx];
      }
      horizontal[row + x] = acc;
    }
  }

  const out = new Float32Array(data.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        const sy = Math.max(0, Math.min(height - 1, y + k - half));
        acc += kernel[k] * horizontal[sy * width + x];
      }
      out[y * width + x] = acc;
    }
  }
  return out;
}
