import { PipelineError } from './errorHandler';

export class TimeoutError extends Error {
  constructor(label: string, public timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Runs `work` with its own AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts. The returned promise settles at the deadline even if `work`
 * ignores the signal.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const error = new PipelineError(`${label} aborted`, 'REQUEST_ABORTED', 499, true);
        controller.abort(error);
        reject(error);
      };
      if (parent.aborted) {
        onParentAbort();
      } else {
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
    }
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}

export type WaitResult<T> =
  | { status: 'settled'; value: T }
  | { status: 'timeout' }
  | { status: 'aborted' };

/**
 * Waits for `promise` for at most `timeoutMs`. Never rejects on timeout or abort:
 * the caller stops waiting while the underlying work carries on.
 */
export async function waitWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<WaitResult<T>> {
  if (signal?.aborted) {
    return { status: 'aborted' };
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const stop = new Promise<WaitResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), timeoutMs);
    if (signal) {
      onAbort = () => resolve({ status: 'aborted' });
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([
      promise.then((value): WaitResult<T> => ({ status: 'settled', value })),
      stop,
    ]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}
