/**
 * In-memory FrameStore for tests. Failures can be switched on per frame.
 */
import { Bitmap } from "../core/bitmap";
import { FrameIoError } from "../core/errors";
import type { FrameStore } from "../core/frame-store";
import type { Frame, FrameDescriptor, Rgb, RgbImage } from "../core/types";

export function solidFrame(id: string, width: number, height: number, rgb: Rgb = [40, 40, 40]): Frame {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i++) data.set(rgb, i * 3);
  return { id, width, height, data };
}

export class MemoryFrameStore implements FrameStore {
  readonly location = null;
  readonly masks = new Map<string, Bitmap>();
  readonly overlays = new Map<string, RgbImage>();
  readonly unreadable = new Set<string>();
  /** Successful saves in order, as "mask:<id>" or "overlay:<id>" */
  readonly writes: string[] = [];
  failSaves = false;

  private frames: Frame[];

  constructor(frames: Frame[], labeled: string[] = []) {
    this.frames = frames;
    for (const id of labeled) {
      const frame = frames.find((f) => f.id === id);
      if (frame) this.masks.set(id, Bitmap.empty(frame.width, frame.height));
    }
  }

  async listLabeled(): Promise<string[]> {
    return this.frames.filter((f) => this.masks.has(f.id)).map((f) => f.id);
  }

  async listPendingFrames(): Promise<FrameDescriptor[]> {
    return this.frames
      .filter((f) => !this.masks.has(f.id))
      .map((f) => ({ id: f.id, path: `memory/${f.id}` }));
  }

  async loadFrame(descriptor: FrameDescriptor): Promise<Frame> {
    const frame = this.frames.find((f) => f.id === descriptor.id);
    if (!frame || this.unreadable.has(descriptor.id)) {
      throw new FrameIoError("load", descriptor.id, new Error("corrupt image"));
    }
    return frame;
  }

  async saveMask(id: string, mask: Bitmap): Promise<string> {
    if (this.failSaves) throw new FrameIoError("save-mask", id, new Error("disk full"));
    this.masks.set(id, mask.clone());
    this.writes.push(`mask:${id}`);
    return `masks/${id}`;
  }

  async saveOverlay(id: string, overlay: RgbImage): Promise<string> {
    if (this.failSaves) throw new FrameIoError("save-overlay", id, new Error("disk full"));
    this.overlays.set(id, overlay);
    this.writes.push(`overlay:${id}`);
    return `overlays/${id}`;
  }
}
