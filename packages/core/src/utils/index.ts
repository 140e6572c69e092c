/**
 * Small helpers shared across packages.
 */

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Sleep that can be interrupted by an AbortSignal.
 * Rejects with AbortedError if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      cleanup();
      reject(new AbortedError());
    };

    const cleanup = () => {
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort);
  });
}

export function minutesToMs(minutes: number): number {
  return minutes * 60_000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1_000;
}

/** Narrow an unknown throw to a Node system error with a `code`. */
export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
