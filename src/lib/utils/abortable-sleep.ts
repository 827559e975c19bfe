/** Build the error used for intentional cancellation */
export function createAbortError(message = 'Aborted'): DOMException {
  return new DOMException(message, 'AbortError');
}

/**
 * Cancellable sleep that rejects with the signal's reason (or an AbortError)
 * when aborted, so a polling loop wakes up as soon as a stop is requested
 * instead of finishing its interval.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? createAbortError());
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      reject(signal?.reason ?? createAbortError());
    }

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Type guard for AbortError — distinguishes a requested stop
 * from a real failure in catch blocks.
 */
export function isAbortError(err: unknown): boolean {
  return (
    (err instanceof DOMException && err.name === 'AbortError') ||
    (err instanceof Error && err.name === 'AbortError')
  );
}
