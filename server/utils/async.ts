export const ABORTED_MESSAGE = 'Aborted';

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.message === ABORTED_MESSAGE || error.name === 'AbortError');

export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(ABORTED_MESSAGE));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error(ABORTED_MESSAGE));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
