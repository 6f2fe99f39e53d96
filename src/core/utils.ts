/**
 * Shared utility functions used across the codebase.
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";

/**
 * Truncate a string to `maxLength`, appending an ellipsis when trimmed.
 * Defaults to the unicode ellipsis `"…"` (1 char).  Pass `"..."` for the
 * three-dot ASCII variant.
 */
export function truncate(value: string, maxLength: number, ellipsis = "…"): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - ellipsis.length))}${ellipsis}`;
}

/**
 * Type guard: returns `true` when `value` is a non-null object
 * (i.e.\ a `Record<string, unknown>`).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function expandHomePath(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }

  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }

  return path;
}

/** Expand `~` and make the path absolute. */
export function resolveUserPath(path: string, home: string = homedir()): string {
  return resolve(expandHomePath(path.trim(), home));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolvePromise, rejectPromise) => {
    if (signal?.aborted) {
      rejectPromise(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      rejectPromise(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolvePromise();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
