/**
 * Event Bus
 *
 * A simple publish-subscribe pattern for decoupling components.
 * The session controller announces lifecycle changes here; loggers and
 * front ends listen without the controller knowing about them.
 */
import type { FrameIoError } from "./errors";

export interface SessionEvents {
  "session:start": { folder: string | null; total: number; labeled: number; pending: number };
  "session:end": { reason: "complete" | "quit"; committed: number; skipped: number; labeled: number };
  "frame:load": { id: string; position: number; pending: number };
  "frame:fail": { id: string; error: FrameIoError };
  "frame:fill": { id: string; area: number; regions: number };
  "frame:clear": { id: string };
  "frame:commit": { id: string; maskPath: string; overlayPath: string; area: number };
  "frame:skip": { id: string };
  "brush:change": { radius: number };
}

// Event name constants for type safety
export const Events = {
  SESSION_START: "session:start",
  SESSION_END: "session:end",

  // Frame lifecycle
  FRAME_LOAD: "frame:load",
  FRAME_FAIL: "frame:fail",
  FRAME_FILL: "frame:fill",
  FRAME_CLEAR: "frame:clear",
  FRAME_COMMIT: "frame:commit",
  FRAME_SKIP: "frame:skip",

  BRUSH_CHANGE: "brush:change",
} as const satisfies Record<string, keyof SessionEvents>;

export type EventName = keyof SessionEvents;

type Handler<T> = (data: T) => void;

export class EventBus {
  private handlers: { [K in EventName]?: Set<Handler<SessionEvents[K]>> } = {};

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends EventName>(event: K, handler: Handler<SessionEvents[K]>): () => void {
    const set: Set<Handler<SessionEvents[K]>> = this.handlers[event] ?? new Set();
    this.handlers[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /**
   * Emit an event with data
   */
  emit<K extends EventName>(event: K, data: SessionEvents[K]): void {
    this.handlers[event]?.forEach((h) => h(data));
  }
}

// Singleton instance
export const bus = new EventBus();
