/**
 * AbortSignal helpers shared by effects, event sources and the runtime.
 */

export interface LinkedSignal {
  readonly signal: AbortSignal;
  /** Detach from both inputs. Call once the work using `signal` settles. */
  dispose(): void;
}

/** A signal that aborts as soon as either input aborts */
export function linkSignals(a: AbortSignal, b: AbortSignal): LinkedSignal {
  const controller = new AbortController();
  if (a.aborted || b.aborted) {
    controller.abort();
    return { signal: controller.signal, dispose: () => {} };
  }

  const dispose = () => {
    a.removeEventListener("abort", abort);
    b.removeEventListener("abort", abort);
  };
  const abort = () => {
    dispose();
    controller.abort();
  };
  a.addEventListener("abort", abort, { once: true });
  b.addEventListener("abort", abort, { once: true });
  return { signal: controller.signal, dispose };
}

/**
 * Pull from an async iterable until it ends or `signal` aborts, passing
 * each value to `onValue`. On abort the iterator is closed.
 */
export async function pump<T>(
  iterable: AsyncIterable<T>,
  onValue: (value: T) => void,
  signal: AbortSignal,
): Promise<void> {
  if (signal.aborted) return;
  const iterator = iterable[Symbol.asyncIterator]();

  while (!signal.aborted) {
    const next = await iterator.next();
    if (next.done) return;
    if (signal.aborted) break;
    onValue(next.value);
  }

  await iterator.return?.();
}

/** Resolves once `signal` aborts */
export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
