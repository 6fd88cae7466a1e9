/**
 * Waits `ms` milliseconds. Resolves early, without rejecting, once `signal`
 * aborts, so a cancelled worker wakes up at once and sees the abort on its
 * next check.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `task` against a timer that resolves with `fallback()` after `ms`.
 * The timer is cleared as soon as either side settles.
 */
export function withDeadline<T>(task: Promise<T>, ms: number, fallback: () => T): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expiry = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(fallback()), ms);
  });

  return Promise.race([task, expiry]).finally(() => {
    clearTimeout(timer);
  });
}

/**
 * Links several abort signals into one controller. The returned `dispose`
 * removes the listeners it installed.
 */
export function linkSignals(controller: AbortController, ...signals: Array<AbortSignal | undefined>): () => void {
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      continue;
    }
    const onAbort = (): void => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return () => {
    for (const cleanup of cleanups) cleanup();
  };
}
