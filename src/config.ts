/**
 * Labeler Configuration
 *
 * Brush bounds, overlay colors and the keymap, validated with zod.
 * Every field has a default, so an empty object (or no file) is valid.
 */
import fse from "fs-extra";
import { z } from "zod";
import type { BrushSettings } from "./core/brush";
import { hexToRgb, isHexColor } from "./core/color-utils";
import type { OverlayStyle } from "./core/compositor";
import { ConfigError } from "./core/errors";
import type { Keymap } from "./core/unified-input";

const hexColor = z.string().refine(isHexColor, { message: "expected a #rrggbb color" });
const keys = z.array(z.string().min(1)).min(1);

export const labelerConfigSchema = z.object({
  brush: z
    .object({
      min: z.number().int().min(1).default(1),
      max: z.number().int().min(1).default(20),
      initial: z.number().int().min(1).default(3),
      eraseScale: z.number().positive().default(2),
    })
    .refine((brush) => brush.min <= brush.max, { message: "brush.min must not exceed brush.max" })
    .default({}),
  overlay: z
    .object({
      color: hexColor.default("#87cefa"),
      opacity: z.number().min(0).max(1).default(0.45),
      strokeColor: hexColor.default("#ff4040"),
      softenKernel: z
        .number()
        .int()
        .positive()
        .refine((n) => n % 2 === 1, { message: "softenKernel must be odd" })
        .default(15),
      quality: z.number().int().min(1).max(100).default(90),
    })
    .default({}),
  keymap: z
    .object({
      fill: keys.default(["f"]),
      commit: keys.default(["Enter", " "]),
      skip: keys.default(["n"]),
      clear: keys.default(["c"]),
      brushUp: keys.default(["+", "="]),
      brushDown: keys.default(["-"]),
      quit: keys.default(["q", "Escape"]),
    })
    .default({}),
});

export type LabelerConfig = z.infer<typeof labelerConfigSchema>;

export function parseConfig(input: unknown, source = "configuration"): LabelerConfig {
  const result = labelerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Read a JSON config file; without a path, return the defaults
 */
export async function loadConfig(file?: string): Promise<LabelerConfig> {
  if (!file) return parseConfig({});

  let raw: unknown;
  try {
    raw = await fse.readJson(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(file, [reason]);
  }
  return parseConfig(raw, file);
}

export function toBrushSettings(config: LabelerConfig): BrushSettings {
  const { min, max, initial, eraseScale } = config.brush;
  return {
    radius: { min, max, step: 1, default: initial },
    eraseScale,
  };
}

export function toOverlayStyle(config: LabelerConfig): OverlayStyle {
  return {
    color: hexToRgb(config.overlay.color),
    opacity: config.overlay.opacity,
    strokeColor: hexToRgb(config.overlay.strokeColor),
    softenKernel: config.overlay.softenKernel,
  };
}

export function toKeymap(config: LabelerConfig): Keymap {
  return config.keymap;
}
