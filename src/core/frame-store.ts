/**
 * Frame Store
 *
 * The session controller's view of where frames come from and where labels go.
 * Implementations report every failure as a FrameIoError.
 */
import type { Bitmap } from "./bitmap";
import type { Frame, FrameDescriptor, RgbImage } from "./types";

export interface FrameStore {
  /** Human-readable origin (folder path), null for in-memory stores */
  readonly location: string | null;

  /** Identifiers of frames that already have a mask */
  listLabeled(): Promise<string[]>;

  /** Frames still to label, in presentation order */
  listPendingFrames(): Promise<FrameDescriptor[]>;

  loadFrame(descriptor: FrameDescriptor): Promise<Frame>;

  /** @returns where the mask was written */
  saveMask(id: string, mask: Bitmap): Promise<string>;

  /** @returns where the overlay was written */
  saveOverlay(id: string, overlay: RgbImage): Promise<string>;
}
