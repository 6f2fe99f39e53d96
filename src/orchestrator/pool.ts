import PQueue from "p-queue";

import {
  type ShelfError,
  isAbortError,
  isShelfError,
  normalizeError,
  systemError,
} from "../core/errors.js";

export type UnitResult<T> =
  | { status: "fulfilled"; index: number; value: T }
  | { status: "rejected"; index: number; error: ShelfError }
  | { status: "cancelled"; index: number; error: ShelfError };

export interface UnitContext {
  index: number;
  /** Aborted when the run is cancelled or times out. */
  signal: AbortSignal;
}

export interface RunBoundedOptions<TInput, TResult> {
  concurrency: number;
  signal?: AbortSignal;
  /** Run-level timeout; behaves like an abort once it elapses. */
  timeoutMs?: number;
  normalizeError?: (error: unknown) => ShelfError;
  onStart?: (input: TInput, index: number) => void;
  onSettled?: (result: UnitResult<TResult>, input: TInput) => void;
}

/**
 * Run one unit of work per input with at most `concurrency` in flight and
 * wait for all of them. Results come back in input order whatever the
 * completion order. A failing unit never cancels its siblings.
 *
 * Cancellation (abort signal or timeout) stops new units from starting;
 * units still queued are reported as `cancelled`, while in-flight units see
 * the aborted signal and are collected when they return.
 */
export async function runBounded<TInput, TResult>(
  inputs: readonly TInput[],
  worker: (input: TInput, context: UnitContext) => Promise<TResult>,
  options: RunBoundedOptions<TInput, TResult>,
): Promise<UnitResult<TResult>[]> {
  const controller = new AbortController();
  const toShelfError = options.normalizeError ?? ((error) => normalizeError(error, "IO_ERROR"));
  const results: Array<UnitResult<TResult> | undefined> = Array.from(
    { length: inputs.length },
    () => undefined,
  );
  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency) });

  const cancel = (reason: unknown): void => {
    if (!controller.signal.aborted) {
      controller.abort(reason);
    }
    queue.clear();
  };

  const onParentAbort = (): void => cancel(options.signal?.reason);
  if (options.signal?.aborted) {
    cancel(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    options.timeoutMs !== undefined
      ? setTimeout(() => {
          cancel(
            systemError("RUN_CANCELLED", `Run timed out after ${options.timeoutMs} ms.`, {
              context: { timeoutMs: options.timeoutMs },
            }),
          );
        }, options.timeoutMs)
      : undefined;

  const settle = (result: UnitResult<TResult>, input: TInput): void => {
    results[result.index] = result;
    options.onSettled?.(result, input);
  };

  try {
    inputs.forEach((input, index) => {
      if (controller.signal.aborted) {
        return;
      }

      void queue.add(async () => {
        if (controller.signal.aborted) {
          return;
        }

        try {
          options.onStart?.(input, index);
          const value = await worker(input, { index, signal: controller.signal });
          settle({ status: "fulfilled", index, value }, input);
        } catch (error) {
          if (controller.signal.aborted && (isAbortError(error) || isShelfError(error, "RUN_CANCELLED"))) {
            settle({ status: "cancelled", index, error: cancellationError(controller.signal) }, input);
            return;
          }
          settle({ status: "rejected", index, error: toShelfError(error) }, input);
        }
      });
    });

    await queue.onIdle();
  } finally {
    options.signal?.removeEventListener("abort", onParentAbort);
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }

  return results.map((result, index) => {
    if (result) {
      return result;
    }
    const cancelled: UnitResult<TResult> = {
      status: "cancelled",
      index,
      error: cancellationError(controller.signal),
    };
    options.onSettled?.(cancelled, inputs[index]);
    return cancelled;
  });
}

function cancellationError(signal: AbortSignal): ShelfError {
  const reason: unknown = signal.reason;
  if (isShelfError(reason, "RUN_CANCELLED")) {
    return reason;
  }
  return systemError("RUN_CANCELLED", "Run was cancelled before this unit completed.", {
    cause: reason,
  });
}
