import type { FrameState } from "./types";

export type FrameIoOperation = "list" | "load" | "save-mask" | "save-overlay";

/**
 * Raised by a FrameStore when reading or writing a frame's files fails.
 * Fatal to the current frame only.
 */
export class FrameIoError extends Error {
  readonly frameId: string | null;
  readonly operation: FrameIoOperation;

  constructor(operation: FrameIoOperation, frameId: string | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed${frameId ? ` for ${frameId}` : ""}: ${reason}`, { cause });
    this.name = "FrameIoError";
    this.operation = operation;
    this.frameId = frameId;
  }
}

export class InvalidTransitionError extends Error {
  readonly from: FrameState | null;
  readonly to: FrameState;

  constructor(from: FrameState | null, to: FrameState) {
    super(`Cannot move frame from ${from ?? "unbound"} to ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class DimensionMismatchError extends Error {
  constructor(expected: { width: number; height: number }, actual: { width: number; height: number }) {
    super(
      `Expected ${expected.width}x${expected.height} pixels, got ${actual.width}x${actual.height}`
    );
    this.name = "DimensionMismatchError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
