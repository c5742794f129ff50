/**
 * Abort Utilities
 *
 * Race async work against AbortSignals and deadlines without leaving
 * dangling listeners or timers.
 */

import { ExchangeCancelledError } from "../errors.js";

/**
 * Race an async operation against an AbortSignal.
 * Rejects with ExchangeCancelledError if the signal fires first.
 */
export function abortableCall<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return fn();
  if (signal.aborted) return Promise.reject(new ExchangeCancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ExchangeCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });

    fn().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * A controller that aborts when any of the given signals does.
 * Call dispose() once the work is done to detach the listeners.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    detach.push(() => source.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => detach.forEach((fn) => fn()),
  };
}

export type TimedResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "timeout" }
  | { ok: false; reason: "error"; error: unknown };

/**
 * Run `fn` with a deadline. The function receives a signal that aborts at
 * the deadline; the returned promise settles no later than the deadline
 * whether or not `fn` honors the signal.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<TimedResult<T>> {
  const controller = new AbortController();
  const linked = linkSignals(controller.signal, parent);

  return new Promise<TimedResult<T>>((resolve) => {
    let settled = false;
    const settle = (result: TimedResult<T>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      linked.dispose();
      resolve(result);
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle({ ok: false, reason: "timeout" });
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = fn(linked.signal);
    } catch (error) {
      settle({ ok: false, reason: "error", error });
      return;
    }
    pending.then(
      (value) => settle({ ok: true, value }),
      (error: unknown) => settle({ ok: false, reason: "error", error }),
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return abortableCall(() => new Promise<void>((resolve) => setTimeout(resolve, ms)), signal);
}
