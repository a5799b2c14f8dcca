export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Resolves `true` once `ms` elapses, or `false` as soon as `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
