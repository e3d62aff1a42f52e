export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Race `run` against a timer. The signal handed to `run` is aborted when the
 * timer fires, so the underlying work can stop too.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () => new TimeoutError('Operation timed out')
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return run(controller.signal);
  }

  let timeout: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      const err = makeTimeoutError();
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}
