/**
 * Resolves after the given number of milliseconds.
 *
 * If an AbortSignal is passed, the sleep resolves early as soon as the signal
 * aborts (it never rejects), so polling loops can check their own exit
 * condition right after waking.
 *
 * ```typescript
 * await sleep(500);
 * await sleep(100, controller.signal);
 * ```
 */

export async function sleep(time: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }

  return new Promise<void>(function (resolve) {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(function () {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, time));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
