import { createLogger, errorMessage } from "./logger";

const log = createLogger("abort");

export function remainingMs(deadline: number, now: number = Date.now()): number {
  return Math.max(0, deadline - now);
}

/** Combines signals; the result aborts with the reason of whichever fires first. */
export function linkSignals(...signals: (AbortSignal | undefined)[]): AbortSignal {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length === 1 && present[0]) return present[0];
  return AbortSignal.any(present);
}

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("Operation aborted");
}

/**
 * Settles with `work` or rejects with the signal's reason as soon as it
 * aborts, whichever comes first. `work` keeps running in the background
 * when the signal wins; a later rejection is only logged.
 */
export function abortable<T>(work: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  const pending = (async () => work())();
  if (!signal) return pending;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      pending.catch((err: unknown) => {
        log.debug(`Abandoned operation rejected after abort: ${errorMessage(err)}`);
      });
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
