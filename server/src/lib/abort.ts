export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Settles with `task`, or rejects with AbortedError as soon as `signal` aborts.
 * The abandoned task keeps running; its eventual rejection is observed here.
 */
export function abortable<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    task.catch(() => undefined);
    return Promise.reject(new AbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      task.catch(() => undefined);
      reject(new AbortedError());
    };
    signal.addEventListener('abort', onAbort, { once: true });
    task.then(
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
