/**
 * Session Logger
 *
 * Prints operator-facing progress lines for session lifecycle events.
 */
import type { EventBus } from "./core/event-bus";
import { Events } from "./core/event-bus";

/**
 * @returns function that detaches every listener
 */
export function attachSessionLogger(bus: EventBus, log: (line: string) => void = console.log) {
  const unsubscribers = [
    bus.on(Events.SESSION_START, ({ folder, total, labeled, pending }) => {
      if (folder) log(`Selected folder : ${folder}`);
      log(`Total images    : ${total}`);
      log(`Already labeled : ${labeled}`);
      log(`To label        : ${pending}`);
      if (pending === 0) log("No unlabeled images found in the selected folder.");
    }),

    bus.on(Events.FRAME_LOAD, ({ id, position, pending }) => {
      log(`[${position}/${pending}] ${id}`);
    }),

    bus.on(Events.FRAME_FILL, ({ area, regions }) => {
      if (regions === 0) {
        log("No enclosed region found - draw a closed boundary first.");
      } else {
        log(`Filled ${regions} region(s), ${area} px`);
      }
    }),

    bus.on(Events.FRAME_COMMIT, ({ id, area }) => {
      log(area === 0 ? `Saved: ${id} (empty mask)` : `Saved: ${id}`);
    }),

    bus.on(Events.FRAME_SKIP, ({ id }) => log(`Skipped: ${id}`)),

    bus.on(Events.FRAME_FAIL, ({ error }) => console.error(error.message)),

    bus.on(Events.BRUSH_CHANGE, ({ radius }) => log(`Brush: ${radius}`)),

    bus.on(Events.SESSION_END, ({ reason, committed, skipped, labeled }) => {
      log(reason === "complete" ? "=== All images processed! ===" : "Quit.");
      log("Session summary");
      log(`  Saved    : ${committed}`);
      log(`  Skipped  : ${skipped}`);
      log(`  Labeled  : ${labeled}`);
    }),
  ];

  return () => unsubscribers.forEach((off) => off());
}
