/**
 * Session Controller
 *
 * Sequences frames through their lifecycle and exposes the interaction
 * surface an event loop drives.
 *
 * Per-frame state machine:
 *   loaded --first interaction--> editing --commit--> committed
 *                                         --skip----> skipped
 *   failed (frame could not be loaded) --skip--> skipped
 *
 * committed and skipped are terminal for the frame; the controller then loads
 * the next pending frame or ends the session when the queue is empty.
 * Quit ends the session from any state and drops uncommitted edits.
 *
 * Key responsibilities:
 * - Owns the session-wide BrushState and the per-frame CanvasState
 * - Routes pointer/key input through the input interpreter
 * - Persists mask and overlay on commit and records progress
 * - Publishes status to a Store and lifecycle events to the EventBus
 */
import { BrushState, defaultBrushSettings, type BrushSettings } from "./brush";
import { CanvasState } from "./canvas-state";
import { defaultOverlayStyle, renderOverlay, type OverlayStyle } from "./compositor";
import { FrameIoError, InvalidTransitionError, type FrameIoOperation } from "./errors";
import { bus as sharedBus, Events, type EventBus } from "./event-bus";
import type { FrameStore } from "./frame-store";
import type { FillResult } from "./region-filler";
import { Store } from "./stores";
import type {
  Frame,
  FrameDescriptor,
  FrameState,
  KeyAction,
  KeyInput,
  PointerInput,
  RgbImage,
  SessionStatus,
} from "./types";
import { defaultKeymap, PointerGesture, resolveKeyAction, type Keymap } from "./unified-input";

export interface SessionOptions {
  /** Settings for a fresh brush, or an existing brush to keep using */
  brush?: BrushSettings | BrushState;
  style?: OverlayStyle;
  keymap?: Keymap;
  bus?: EventBus;
}

const transitions: Record<FrameState, readonly FrameState[]> = {
  loaded: ["editing"],
  editing: ["committed", "skipped"],
  failed: ["skipped"],
  committed: [],
  skipped: [],
};

export class SessionController {
  readonly brush: BrushState;
  readonly canvas = new CanvasState();
  /** Identifiers that have a mask on disk, including ones committed this session */
  readonly progress = new Set<string>();
  readonly status: Store<SessionStatus>;

  private store: FrameStore;
  private style: OverlayStyle;
  private keymap: Keymap;
  private bus: EventBus;
  private gesture = new PointerGesture();

  private queue: FrameDescriptor[] = [];
  private index = 0;
  private frameId: string | null = null;
  private frameState: FrameState | null = null;
  private ended = false;
  private reason: "complete" | "quit" | null = null;
  private committedCount = 0;
  private skippedCount = 0;

  constructor(store: FrameStore, options: SessionOptions = {}) {
    this.store = store;
    this.brush =
      options.brush instanceof BrushState
        ? options.brush
        : new BrushState(options.brush ?? defaultBrushSettings);
    this.style = options.style ?? defaultOverlayStyle;
    this.keymap = options.keymap ?? defaultKeymap;
    this.bus = options.bus ?? sharedBus;
    this.status = new Store<SessionStatus>(this.snapshot());
  }

  get state(): FrameState | null {
    return this.frameState;
  }

  get currentFrameId(): string | null {
    return this.frameId;
  }

  /** Why the session ended, null while it runs */
  get endReason(): "complete" | "quit" | null {
    return this.reason;
  }

  get pendingFrames(): readonly FrameDescriptor[] {
    return this.queue;
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  /**
   * Build the work queue from the store and load the first frame.
   * Rejects with FrameIoError when the first frame cannot be loaded; the
   * controller is then in the "failed" state and skip() moves past it.
   */
  async start(): Promise<void> {
    const labeled = await this.guardIo("list", null, () => this.store.listLabeled());
    labeled.forEach((id) => this.progress.add(id));
    this.queue = await this.guardIo("list", null, () => this.store.listPendingFrames());
    this.index = 0;

    this.bus.emit(Events.SESSION_START, {
      folder: this.store.location,
      total: labeled.length + this.queue.length,
      labeled: labeled.length,
      pending: this.queue.length,
    });

    await this.loadCurrent();
  }

  /**
   * Bind a frame as the current one. Legal only before the first frame or
   * after the current one was committed or skipped; a failed frame must be
   * skipped first so the queue position matches the bound frame.
   */
  beginFrame(frame: Frame) {
    const from = this.frameState;
    if (this.ended || (from !== null && from !== "committed" && from !== "skipped")) {
      throw new InvalidTransitionError(from, "loaded");
    }

    this.canvas.beginFrame(frame);
    this.gesture.reset();
    this.frameId = frame.id;
    this.frameState = "loaded";

    this.bus.emit(Events.FRAME_LOAD, {
      id: frame.id,
      position: this.index + 1,
      pending: this.queue.length,
    });
    this.publish();
  }

  isSessionComplete(): boolean {
    return this.ended;
  }

  /**
   * Composited view of the current frame: region fill plus live strokes
   */
  currentRenderFrame(): RgbImage {
    const image = this.canvas.render(this.style);
    if (!image) {
      throw new Error("No frame is loaded");
    }
    return image;
  }

  // ============================================================
  // Input
  // ============================================================

  handlePointerEvent(e: PointerInput) {
    if (this.ended) return;

    const command = this.gesture.handle(e);
    if (!command) return;

    if (command.type === "brush") {
      this.resizeBrush(command.steps);
      return;
    }

    if (!this.isEditable()) return;
    this.touch();
    this.brush.setMode(command.mode);
    this.canvas.stroke(command.from, command.to, this.brush);
  }

  /**
   * Resolve and run the key's action. Commit and skip resolve after any
   * file I/O and the next frame's load have finished.
   * @returns the action run, or undefined for an unbound key
   */
  async handleKeyEvent(e: KeyInput): Promise<KeyAction | undefined> {
    const action = resolveKeyAction(e.key, this.keymap);
    if (!action) return undefined;

    switch (action) {
      case "quit":
        this.quit();
        break;
      case "skip":
        await this.skip();
        break;
      case "commit":
        await this.commit();
        break;
      case "fill":
        this.fill();
        break;
      case "clear":
        this.clear();
        break;
      case "brushUp":
        this.resizeBrush(1);
        break;
      case "brushDown":
        this.resizeBrush(-1);
        break;
    }
    return action;
  }

  // ============================================================
  // Actions
  // ============================================================

  fill(): FillResult | null {
    if (!this.isEditable() || !this.frameId) return null;
    this.touch();
    const result = this.canvas.fill();
    this.bus.emit(Events.FRAME_FILL, {
      id: this.frameId,
      area: result.area,
      regions: result.regions,
    });
    return result;
  }

  clear() {
    if (!this.isEditable() || !this.frameId) return;
    this.touch();
    this.canvas.clear();
    this.bus.emit(Events.FRAME_CLEAR, { id: this.frameId });
  }

  resizeBrush(steps: number): number {
    if (this.ended) return this.brush.radius;
    const before = this.brush.radius;
    const radius = this.brush.resize(steps);
    if (radius !== before) {
      this.bus.emit(Events.BRUSH_CHANGE, { radius });
      this.publish();
    }
    return radius;
  }

  /**
   * Save the region mask and its overlay, then advance.
   * An empty mask is a valid label. On a save failure the frame stays in
   * "editing" with its buffers intact and the FrameIoError propagates.
   * The overlay is written first: the mask file marks a frame as labeled.
   */
  async commit(): Promise<boolean> {
    const frame = this.canvas.boundFrame;
    if (!this.isEditable() || !frame) return false;
    this.touch();

    const mask = this.canvas.regionMask;
    const overlay = renderOverlay(frame, mask, this.style);
    const overlayPath = await this.guardIo("save-overlay", frame.id, () =>
      this.store.saveOverlay(frame.id, overlay)
    );
    const maskPath = await this.guardIo("save-mask", frame.id, () =>
      this.store.saveMask(frame.id, mask)
    );

    this.transition("committed");
    this.progress.add(frame.id);
    this.committedCount++;
    this.bus.emit(Events.FRAME_COMMIT, {
      id: frame.id,
      maskPath,
      overlayPath,
      area: mask.count(),
    });

    await this.advance();
    return true;
  }

  /**
   * Leave the current frame unlabeled and advance. Nothing is written, so the
   * frame is offered again next session.
   */
  async skip(): Promise<boolean> {
    const id = this.frameId;
    if (this.ended || !id) return false;
    this.touch();

    this.transition("skipped");
    this.skippedCount++;
    this.bus.emit(Events.FRAME_SKIP, { id });

    await this.advance();
    return true;
  }

  quit() {
    if (this.ended) return;
    this.finish("quit");
  }

  // ============================================================
  // Internals
  // ============================================================

  private isEditable(): boolean {
    return !this.ended && (this.frameState === "loaded" || this.frameState === "editing");
  }

  /**
   * First interaction moves a freshly loaded frame into editing
   */
  private touch() {
    if (this.frameState === "loaded") this.transition("editing");
  }

  private transition(to: FrameState) {
    const from = this.frameState;
    if (!from || !transitions[from].includes(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.frameState = to;
    this.publish();
  }

  private async advance() {
    this.index++;
    await this.loadCurrent();
  }

  private async loadCurrent() {
    const descriptor = this.queue.at(this.index);
    if (!descriptor) {
      this.finish("complete");
      return;
    }

    let frame: Frame;
    try {
      frame = await this.store.loadFrame(descriptor);
    } catch (error) {
      const failure =
        error instanceof FrameIoError ? error : new FrameIoError("load", descriptor.id, error);
      this.canvas.release();
      this.gesture.reset();
      this.frameId = descriptor.id;
      this.frameState = "failed";
      this.bus.emit(Events.FRAME_FAIL, { id: descriptor.id, error: failure });
      this.publish();
      throw failure;
    }

    this.beginFrame(frame);
  }

  private finish(reason: "complete" | "quit") {
    this.ended = true;
    this.reason = reason;
    this.canvas.release();
    this.gesture.reset();
    this.bus.emit(Events.SESSION_END, {
      reason,
      committed: this.committedCount,
      skipped: this.skippedCount,
      labeled: this.progress.size,
    });
    this.publish();
  }

  private async guardIo<T>(
    operation: FrameIoOperation,
    frameId: string | null,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof FrameIoError) throw error;
      throw new FrameIoError(operation, frameId, error);
    }
  }

  private snapshot(): SessionStatus {
    return {
      frameId: this.frameId,
      state: this.frameState,
      position: Math.min(this.index + 1, this.queue.length),
      pending: this.queue.length,
      labeled: this.progress.size,
      total: this.progress.size + this.queue.length - this.committedCount,
      brushRadius: this.brush.radius,
      complete: this.ended,
    };
  }

  private publish() {
    this.status.set(this.snapshot());
  }
}
