/**
 * Event Scripts
 *
 * A JSON array of input events that replays a labeling session headlessly.
 * Besides raw pointer/wheel/key events, a "stroke" entry expands to a
 * down, moves and up along its points:
 *
 *   [
 *     { "type": "stroke", "points": [[30, 30], [70, 30], [70, 70], [30, 70], [30, 30]] },
 *     { "type": "key", "key": "f" },
 *     { "type": "key", "key": "Enter" }
 *   ]
 */
import fse from "fs-extra";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import type { InputEvent } from "../core/types";

const button = z.enum(["primary", "secondary"]).default("primary");

const pointerEventSchema = z.object({
  type: z.enum(["down", "move", "up"]),
  x: z.number(),
  y: z.number(),
  button,
});

const wheelEventSchema = z.object({
  type: z.literal("wheel"),
  deltaY: z.number(),
});

const keyEventSchema = z.object({
  type: z.literal("key"),
  key: z.string().min(1),
});

const strokeSchema = z.object({
  type: z.literal("stroke"),
  points: z.array(z.tuple([z.number(), z.number()])).min(1),
  button,
});

export const eventScriptSchema = z.array(
  z.union([pointerEventSchema, wheelEventSchema, keyEventSchema, strokeSchema])
);

export type ScriptEntry = z.infer<typeof eventScriptSchema>[number];

export function expandScript(entries: readonly ScriptEntry[]): InputEvent[] {
  const events: InputEvent[] = [];
  for (const entry of entries) {
    if (entry.type !== "stroke") {
      events.push(entry);
      continue;
    }

    const [first, ...rest] = entry.points;
    events.push({ type: "down", x: first[0], y: first[1], button: entry.button });
    for (const [x, y] of rest) events.push({ type: "move", x, y, button: entry.button });
    const [lastX, lastY] = rest.length > 0 ? rest[rest.length - 1] : first;
    events.push({ type: "up", x: lastX, y: lastY, button: entry.button });
  }
  return events;
}

export function parseEventScript(input: unknown, source = "event script"): InputEvent[] {
  const result = eventScriptSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return expandScript(result.data);
}

export async function readEventScript(file: string): Promise<InputEvent[]> {
  let raw: unknown;
  try {
    raw = await fse.readJson(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(file, [reason]);
  }
  return parseEventScript(raw, file);
}
