/**
 * Type Definitions
 *
 * Shared TypeScript interfaces used across all modules:
 * - Point: x, y coordinates in frame pixel space
 * - RgbImage / Frame: 8-bit, 3-channel pixel grids
 * - PointerInput / KeyInput: raw events fed in by the event loop
 * - FrameState: per-frame lifecycle of the session controller
 */
export interface Point {
  x: number;
  y: number;
}

export type Rgb = readonly [number, number, number];

export type BrushMode = "draw" | "erase";

/**
 * Interleaved RGB pixels, row-major, `width * height * 3` bytes
 */
export interface RgbImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * A loaded source image. `id` is the file name inside the frames folder.
 */
export interface Frame extends RgbImage {
  readonly id: string;
}

export interface FrameDescriptor {
  id: string;
  path: string;
}

// ============================================================
// Input Events
// ============================================================

/**
 * Primary button draws, secondary erases
 */
export type PointerButton = "primary" | "secondary";

export interface PointerButtonInput {
  type: "down" | "move" | "up";
  x: number;
  y: number;
  button: PointerButton;
}

export interface WheelInput {
  type: "wheel";
  deltaY: number;
}

export type PointerInput = PointerButtonInput | WheelInput;

/**
 * `key` follows KeyboardEvent.key naming ("f", "Enter", " ", "Escape")
 */
export interface KeyInput {
  type: "key";
  key: string;
}

export type InputEvent = PointerInput | KeyInput;

export type KeyAction =
  | "fill"
  | "commit"
  | "skip"
  | "clear"
  | "brushUp"
  | "brushDown"
  | "quit";

// ============================================================
// Session
// ============================================================

export type FrameState = "loaded" | "editing" | "committed" | "skipped" | "failed";

export interface SessionStatus {
  frameId: string | null;
  state: FrameState | null;
  /** 1-based position of the current frame in the pending queue */
  position: number;
  pending: number;
  labeled: number;
  total: number;
  brushRadius: number;
  complete: boolean;
}
