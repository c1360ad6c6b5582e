// Cancellable timing primitives used by the command executor. Every wait
// takes an AbortSignal and rejects with an AbortError once it fires.

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "AbortError";
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw abortError();
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A latch that can be fired from a synchronous callback and awaited from a
 * cancellable task. Firing before anyone waits is remembered until `reset()`.
 */
export class WakeSignal {
  private fired = false;
  private readonly waiters = new Set<() => void>();

  get isFired(): boolean {
    return this.fired;
  }

  fire(): void {
    this.fired = true;
    for (const wake of this.waiters) wake();
    this.waiters.clear();
  }

  reset(): void {
    this.fired = false;
  }

  wait(signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }
      if (this.fired) {
        resolve();
        return;
      }
      const onAbort = () => {
        this.waiters.delete(wake);
        reject(abortError());
      };
      const wake = () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      };
      this.waiters.add(wake);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}

export type RaceEntry<K extends string> = readonly [K, (signal: AbortSignal) => Promise<void>];

/**
 * Wait on the first of several cancellable tasks. The losers are aborted and
 * awaited before this resolves, so nothing from the race outlives the call.
 * Aborting `parent` cancels every entry and rejects with an AbortError.
 */
export async function firstOf<K extends string>(
  entries: ReadonlyArray<RaceEntry<K>>,
  parent: AbortSignal,
): Promise<K> {
  throwIfAborted(parent);
  const child = new AbortController();
  const forward = () => child.abort();
  parent.addEventListener("abort", forward, { once: true });

  const running = entries.map(([key, run]) => run(child.signal).then(() => key));
  try {
    return await Promise.race(running);
  } finally {
    child.abort();
    parent.removeEventListener("abort", forward);
    await Promise.allSettled(running);
  }
}
