/**
 * Async helpers shared by the layers
 */

import { TransportError } from "../layers/transport-error.js";

/**
 * Wait for `ms`, rejecting with a `cancelled` TransportError if the signal
 * aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(TransportError.of("cancelled"));
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      reject(TransportError.of("cancelled"));
    }

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs tasks one at a time in submission order. A failed task does not
 * block the ones queued after it; its rejection goes to its own caller.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once everything queued so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }
}

/** Map with at most `limit` calls in flight, preserving input order */
export async function mapWithConcurrency<T, R>(
  inputs: readonly T[],
  limit: number,
  fn: (input: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(inputs.length);
  const width = Math.max(1, Math.min(limit, inputs.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < inputs.length) {
      const index = next++;
      results[index] = await fn(inputs[index]);
    }
  }

  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}
