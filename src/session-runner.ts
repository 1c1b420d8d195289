/**
 * Session Runner
 *
 * The event loop around a SessionController: waits for the next input event,
 * hands it to the controller and waits for it to finish before taking the
 * next. Waiting for input is the only suspension point.
 *
 * Policy for I/O failures:
 * - a frame that cannot be loaded is reported and skipped
 * - a failed save propagates and stops the run
 *
 * When the event source runs dry before the queue is done, the session quits
 * and the current frame's uncommitted edits are dropped.
 */
import { FrameIoError } from "./core/errors";
import type { SessionController } from "./core/session-controller";
import type { InputEvent } from "./core/types";

export interface SessionSummary {
  reason: "complete" | "quit";
  /** Identifiers with a mask, including earlier sessions */
  labeled: number;
}

/**
 * Run an action that may load a frame, skipping past frames that fail to load
 */
async function skipUnreadable(controller: SessionController, run: () => Promise<unknown>) {
  let next = run;
  for (;;) {
    try {
      await next();
      return;
    } catch (error) {
      if (!(error instanceof FrameIoError) || error.operation !== "load") throw error;
      console.warn(`Skipping unreadable file: ${error.frameId ?? "(unknown)"}`);
      next = () => controller.skip();
    }
  }
}

export async function dispatchEvent(controller: SessionController, event: InputEvent) {
  if (event.type === "key") {
    await skipUnreadable(controller, () => controller.handleKeyEvent(event));
  } else {
    controller.handlePointerEvent(event);
  }
}

export async function runSession(
  controller: SessionController,
  events: AsyncIterable<InputEvent> | Iterable<InputEvent>
): Promise<SessionSummary> {
  await skipUnreadable(controller, () => controller.start());

  if (!controller.isSessionComplete()) {
    for await (const event of events) {
      await dispatchEvent(controller, event);
      if (controller.isSessionComplete()) break;
    }
  }

  controller.quit();

  return {
    reason: controller.endReason ?? "quit",
    labeled: controller.progress.size,
  };
}
