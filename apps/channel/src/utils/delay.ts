import { ShutdownRequestedError } from "../errors.js";

/** Resolves after `ms`, or rejects with ShutdownRequestedError as soon as `signal` aborts. */
export const delay = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ShutdownRequestedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ShutdownRequestedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
