export class SessionAbortedError extends Error {
  constructor() {
    super('Realtime session was stopped');
    this.name = 'SessionAbortedError';
  }
}

/** Races a promise against the session's abort signal. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // The abandoned promise may still settle; keep its rejection handled
    promise.catch(() => undefined);
    return Promise.reject(new SessionAbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new SessionAbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
