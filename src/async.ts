/**
 * Suspension helpers shared by the orchestrator and the device monitors.
 */

/**
 * Outcome of racing a promise against a deadline.
 */
export type TimedResult<T> =
  | { readonly type: "COMPLETED"; readonly value: T }
  | { readonly type: "TIMED_OUT"; readonly timeoutMs: number }
  | { readonly type: "ABORTED" };

/**
 * Race a promise against a timeout and an optional abort signal.
 * The timer is always cleared so nothing keeps the event loop alive.
 *
 * Rejections of the promise propagate to the caller.
 *
 * @example
 * const result = await withTimeout(controller.init(), 30000, signal);
 * if (result.type === "TIMED_OUT") log.error("init timed out");
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<TimedResult<T>> {
  if (signal?.aborted) {
    return { type: "ABORTED" };
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<TimedResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ type: "TIMED_OUT", timeoutMs }), timeoutMs);
  });

  const aborted = new Promise<TimedResult<T>>((resolve) => {
    onAbort = () => resolve({ type: "ABORTED" });
    signal?.addEventListener("abort", onAbort, { once: true });
  });

  const completed = promise.then(
    (value): TimedResult<T> => ({ type: "COMPLETED", value }),
  );

  try {
    return await Promise.race([completed, deadline, aborted]);
  } finally {
    clearTimeout(timer);
    if (onAbort) {
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Park until the signal is aborted. Resolves immediately if it already is.
 */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
