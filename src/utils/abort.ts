/**
 * Aborts `target` whenever `source` aborts, carrying the same reason.
 * Returns a function that detaches the listener.
 */
export const forwardAbort = (source: AbortSignal | undefined, target: AbortController): (() => void) => {
  if (!source) {
    return () => {};
  }

  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }

  const onAbort = () => target.abort(source.reason);
  source.addEventListener('abort', onAbort, {once: true});
  return () => source.removeEventListener('abort', onAbort);
};

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as the
 * signal aborts, whichever comes first.
 */
export const abortable = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    // the abandoned promise still settles later; keep that from surfacing as unhandled
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, {once: true});

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
};
