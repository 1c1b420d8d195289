/**
 * File-System Frame Store
 *
 * Frames come from one folder; labels go to sibling folders:
 *
 *   <parent>/<frames>/017.jpg
 *   <parent>/masks/017.jpg.png      lossless single-channel, region = 255
 *   <parent>/overlays/017.jpg.jpg   RGB, lossy
 *
 * Artifacts are keyed by the full file name, so 017.jpg and 017.png never
 * share a mask. A frame counts as labeled when its mask exists. Frames are offered in
 * natural order ("frame2" before "frame10").
 */
import path from "node:path";
import fse from "fs-extra";
import sharp from "sharp";
import type { Bitmap } from "../core/bitmap";
import { FrameIoError } from "../core/errors";
import type { FrameStore } from "../core/frame-store";
import type { Frame, FrameDescriptor, RgbImage } from "../core/types";

export const SUPPORTED_FORMATS = [".jpg", ".jpeg", ".png", ".bmp", ".webp"] as const;

export interface FsFrameStoreOptions {
  /** JPEG quality of saved overlays (1-100) */
  overlayQuality?: number;
}

/**
 * Compare strings so that embedded numbers sort by value
 */
export function naturalCompare(a: string, b: string): number {
  const left = a.split(/(\d+)/);
  const right = b.split(/(\d+)/);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] === right[i]) continue;
    // split() with a capture group puts digit runs at odd indices
    if (i % 2 === 1) {
      const diff = Number(left[i]) - Number(right[i]);
      if (diff !== 0) return diff;
    }
    return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

export function isSupportedImage(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_FORMATS.some((format) => format === ext);
}

export class FsFrameStore implements FrameStore {
  readonly framesDir: string;
  readonly masksDir: string;
  readonly overlaysDir: string;
  private overlayQuality: number;

  constructor(framesDir: string, options: FsFrameStoreOptions = {}) {
    this.framesDir = path.resolve(framesDir);
    const parent = path.dirname(this.framesDir);
    this.masksDir = path.join(parent, "masks");
    this.overlaysDir = path.join(parent, "overlays");
    this.overlayQuality = options.overlayQuality ?? 90;
  }

  get location(): string {
    return this.framesDir;
  }

  maskPath(id: string): string {
    return path.join(this.masksDir, `${id}.png`);
  }

  overlayPath(id: string): string {
    return path.join(this.overlaysDir, `${id}.jpg`);
  }

  /**
   * Every supported image in the frames folder, naturally sorted
   */
  async listFrames(): Promise<FrameDescriptor[]> {
    try {
      const entries = await fse.readdir(this.framesDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && isSupportedImage(entry.name))
        .map((entry) => entry.name)
        .sort(naturalCompare)
        .map((id) => ({ id, path: path.join(this.framesDir, id) }));
    } catch (error) {
      throw new FrameIoError("list", null, error);
    }
  }

  async listLabeled(): Promise<string[]> {
    const [frames, masked] = await Promise.all([this.listFrames(), this.listMaskedIds()]);
    return frames.filter((frame) => masked.has(frame.id)).map((frame) => frame.id);
  }

  async listPendingFrames(): Promise<FrameDescriptor[]> {
    const [frames, masked] = await Promise.all([this.listFrames(), this.listMaskedIds()]);
    return frames.filter((frame) => !masked.has(frame.id));
  }

  async loadFrame(descriptor: FrameDescriptor): Promise<Frame> {
    try {
      const { data, info } = await sharp(descriptor.path)
        .removeAlpha()
        .toColourspace("srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 3) {
        throw new Error(`expected 3 channels, decoded ${info.channels}`);
      }

      return {
        id: descriptor.id,
        width: info.width,
        height: info.height,
        data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
      };
    } catch (error) {
      throw new FrameIoError("load", descriptor.id, error);
    }
  }

  async saveMask(id: string, mask: Bitmap): Promise<string> {
    const output = this.maskPath(id);
    try {
      const pixels = Buffer.alloc(mask.data.length);
      for (let i = 0; i < mask.data.length; i++) pixels[i] = mask.data[i] ? 255 : 0;

      await fse.ensureDir(this.masksDir);
      await sharp(pixels, { raw: { width: mask.width, height: mask.height, channels: 1 } })
        .png()
        .toFile(output);
      return output;
    } catch (error) {
      throw new FrameIoError("save-mask", id, error);
    }
  }

  async saveOverlay(id: string, overlay: RgbImage): Promise<string> {
    const output = this.overlayPath(id);
    try {
      await fse.ensureDir(this.overlaysDir);
      await sharp(Buffer.from(overlay.data), {
        raw: { width: overlay.width, height: overlay.height, channels: 3 },
      })
        .jpeg({ quality: this.overlayQuality })
        .toFile(output);
      return output;
    } catch (error) {
      throw new FrameIoError("save-overlay", id, error);
    }
  }

  /**
   * Frame identifiers that have a mask: "017.jpg.png" belongs to "017.jpg"
   */
  private async listMaskedIds(): Promise<Set<string>> {
    try {
      if (!(await fse.pathExists(this.masksDir))) return new Set();
      const names = await fse.readdir(this.masksDir);
      return new Set(
        names.filter((name) => name.endsWith(".png")).map((name) => name.slice(0, -".png".length))
      );
    } catch (error) {
      throw new FrameIoError("list", null, error);
    }
  }
}
