/**
 * Unified Input Interpreter
 *
 * Turns raw pointer, wheel and key events into editing commands.
 *
 * State machine with gesture states:
 * - idle: no button held
 * - drawing: primary button held, samples extend the boundary
 * - erasing: secondary button held, samples cut the boundary
 *
 * Pressing the other button mid-gesture switches gestures at that point.
 * Keys resolve through a configurable keymap (case-insensitive).
 */
import type { BrushMode, KeyAction, Point, PointerInput } from "./types";

export type GestureState = "idle" | "drawing" | "erasing";

export type InputCommand =
  | { type: "stroke"; mode: BrushMode; from: Point | null; to: Point }
  | { type: "brush"; steps: number };

export type Keymap = Record<KeyAction, readonly string[]>;

const keyActions: readonly KeyAction[] = [
  "fill",
  "commit",
  "skip",
  "clear",
  "brushUp",
  "brushDown",
  "quit",
];

export const defaultKeymap: Keymap = {
  fill: ["f"],
  commit: ["Enter", " "],
  skip: ["n"],
  clear: ["c"],
  brushUp: ["+", "="],
  brushDown: ["-"],
  quit: ["q", "Escape"],
};

export class PointerGesture {
  private gestureState: GestureState = "idle";
  private lastPoint: Point | null = null;

  getGestureState(): GestureState {
    return this.gestureState;
  }

  reset() {
    this.gestureState = "idle";
    this.lastPoint = null;
  }

  handle(e: PointerInput): InputCommand | null {
    switch (e.type) {
      case "wheel":
        // Scrolling up (negative delta) grows the brush
        if (e.deltaY === 0) return null;
        return { type: "brush", steps: e.deltaY < 0 ? 1 : -1 };

      case "down": {
        this.gestureState = e.button === "primary" ? "drawing" : "erasing";
        const point = { x: e.x, y: e.y };
        this.lastPoint = point;
        return { type: "stroke", mode: this.currentMode(), from: null, to: point };
      }

      case "move": {
        if (this.gestureState === "idle" || !this.lastPoint) return null;
        const point = { x: e.x, y: e.y };
        const from = this.lastPoint;
        this.lastPoint = point;
        return { type: "stroke", mode: this.currentMode(), from, to: point };
      }

      case "up": {
        const released = e.button === "primary" ? "drawing" : "erasing";
        if (this.gestureState === released) this.reset();
        return null;
      }
    }
  }

  private currentMode(): BrushMode {
    return this.gestureState === "erasing" ? "erase" : "draw";
  }
}

/**
 * Look up the action bound to a key
 */
export function resolveKeyAction(key: string, keymap: Keymap = defaultKeymap): KeyAction | undefined {
  const wanted = key.toLowerCase();
  for (const action of keyActions) {
    if (keymap[action].some((k) => k.toLowerCase() === wanted)) return action;
  }
  return undefined;
}
